import type { FailedOutcome, RepositoryOutcome } from '@charm-fleet/shared';
import { renderTable } from './table';

export interface OutcomeCounts {
  succeeded: number;
  skipped: number;
  failed: number;
}

export function countOutcomes(outcomes: readonly RepositoryOutcome<unknown>[]): OutcomeCounts {
  return {
    succeeded: outcomes.filter((o) => o.status === 'success').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
  };
}

export function isFailed<T>(outcome: RepositoryOutcome<T>): outcome is FailedOutcome {
  return outcome.status === 'failed';
}

export function renderOutcomes<T>(
  outcomes: readonly RepositoryOutcome<T>[],
  describe: (value: T) => string
): string {
  return renderTable(
    ['repo', 'status', 'detail'],
    outcomes.map((outcome) => {
      switch (outcome.status) {
        case 'success':
          return [outcome.repository, outcome.status, describe(outcome.value)];
        case 'skipped':
          return [outcome.repository, outcome.status, outcome.reason];
        case 'failed':
          return [outcome.repository, outcome.status, `${outcome.error.name}: ${outcome.error.message}`];
      }
    })
  );
}
