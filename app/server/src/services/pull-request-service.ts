import type {
  FailedOutcome,
  MergeResult,
  PullRequestSummary,
  RepositoryOutcome,
} from '@charm-fleet/shared';
import { getErrorMessage, toOutcomeError } from '../lib/errors';
import { createPrMergedEvent, createRepoFailedEvent, createRepoStartedEvent } from '../lib/events';
import { createLogger } from '../lib/logger';
import { mapWithConcurrency } from '../lib/pool';
import { renderTable, type Cell } from '../lib/table';
import type { OrchestratorContext } from './context';
import type { BatchRun } from './release-service';
import type { RunStartListener } from './run-recorder';

const log = createLogger('pull-requests');

export const REPORT_HEADERS = ['repo', 'pr', 'success', 'failure', 'skipped', 'approvals', 'ready'];

export interface MergeOptions {
  force?: boolean;
  onStart?: RunStartListener;
}

export function isReadyToMerge(pullRequest: PullRequestSummary): boolean {
  return pullRequest.state === 'open' && pullRequest.mergeable;
}

/**
 * Pull requests opened from one branch across the registry, in registry order.
 */
export class PullRequestReport {
  constructor(
    readonly branch: string,
    readonly pullRequests: readonly PullRequestSummary[],
    readonly failures: readonly FailedOutcome[] = []
  ) {}

  rows(): Cell[][] {
    return this.pullRequests.map((pr) => [
      pr.repository,
      pr.url,
      pr.checks.success,
      pr.checks.failure,
      pr.checks.skipped,
      `${pr.approvals.approved}/${pr.approvals.total}`,
      isReadyToMerge(pr) ? 'yes' : 'no',
    ]);
  }

  table(): string {
    return renderTable(REPORT_HEADERS, this.rows());
  }

  readyToMerge(): PullRequestSummary[] {
    return this.pullRequests.filter(isReadyToMerge);
  }
}

interface ListingResult {
  pullRequests: PullRequestSummary[];
  failure?: FailedOutcome;
}

export async function summarizePullRequests(
  context: OrchestratorContext,
  branch: string
): Promise<PullRequestReport> {
  const results = await mapWithConcurrency(
    context.registry.clients(),
    context.concurrency,
    async (client): Promise<ListingResult> => {
      const pullRequests: PullRequestSummary[] = [];
      try {
        for await (const pullRequest of client.listPullRequests(branch)) {
          pullRequests.push(pullRequest);
        }
        return { pullRequests };
      } catch (error) {
        log.error({ repository: client.fullName, branch, error: getErrorMessage(error) }, 'Failed to list pull requests');
        const failure: FailedOutcome = {
          repository: client.fullName,
          status: 'failed',
          error: toOutcomeError(error),
        };
        return { pullRequests, failure };
      }
    }
  );

  return new PullRequestReport(
    branch,
    results.flatMap((result) => result.pullRequests),
    results.flatMap((result) => (result.failure ? [result.failure] : []))
  );
}

/**
 * Merges the ready pull requests of a report, or every open one with `force`.
 * Each pull request is merged independently.
 */
export async function mergePullRequests(
  context: OrchestratorContext,
  report: PullRequestReport,
  options: MergeOptions = {}
): Promise<BatchRun<MergeResult>> {
  const run = await context.recorder.start('merge', {
    branch: report.branch,
    repositories: report.pullRequests.length,
    onStart: options.onStart,
  });

  const outcomes = await mapWithConcurrency(
    report.pullRequests,
    context.concurrency,
    async (pullRequest): Promise<RepositoryOutcome<MergeResult>> => {
      const repository = pullRequest.repository;
      if (pullRequest.state === 'merged') {
        return { repository, status: 'skipped', reason: 'already merged' };
      }
      if (pullRequest.state === 'closed') {
        return { repository, status: 'skipped', reason: 'closed' };
      }
      if (!options.force && !isReadyToMerge(pullRequest)) {
        return { repository, status: 'skipped', reason: 'not mergeable' };
      }

      await run.record(createRepoStartedEvent(run.id, repository));
      try {
        const client = context.registry.findClient(repository);
        if (!client) {
          throw new Error(`Repository ${repository} is not in the registry`);
        }
        const result = await client.mergePullRequest(pullRequest);
        await run.record(createPrMergedEvent(run.id, repository, result.url, result.number));
        return { repository, status: 'success', value: result };
      } catch (error) {
        const message = getErrorMessage(error);
        log.error({ repository, pr: pullRequest.number, error: message }, 'Merge failed');
        await run.record(createRepoFailedEvent(run.id, repository, message));
        return { repository, status: 'failed', error: toOutcomeError(error) };
      }
    }
  );

  await run.complete(outcomes);
  return { runId: run.id, outcomes };
}
