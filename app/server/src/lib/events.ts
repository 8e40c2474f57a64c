import { nanoid } from 'nanoid';
import type {
  RunKind,
  RunStartedEvent,
  RunCompletedEvent,
  RepoStartedEvent,
  BranchCreatedEvent,
  BranchSkippedEvent,
  CommittedEvent,
  PrOpenedEvent,
  PrMergedEvent,
  RepoFailedEvent,
  RunEvent,
  RunEventType,
} from '@charm-fleet/shared';
import { isRecord } from './guards';
import type { OutcomeCounts } from './outcome';

const RUN_EVENT_TYPES: ReadonlySet<string> = new Set<RunEventType>([
  'run_started',
  'run_completed',
  'repo_started',
  'branch_created',
  'branch_skipped',
  'committed',
  'pr_opened',
  'pr_merged',
  'repo_failed',
]);

// Shape check for journal lines
export function isRunEvent(value: unknown): value is RunEvent {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.runId === 'string' &&
    typeof value.timestamp === 'string' &&
    typeof value.type === 'string' &&
    RUN_EVENT_TYPES.has(value.type)
  );
}

function createEventId(): string {
  return nanoid(12);
}

function timestamp(): string {
  return new Date().toISOString();
}

export function createRunId(): string {
  return `RUN-${nanoid(8)}`;
}

export function createRunStartedEvent(
  runId: string,
  kind: RunKind,
  repositories: number,
  branch?: string
): RunStartedEvent {
  return {
    id: createEventId(),
    type: 'run_started',
    timestamp: timestamp(),
    runId,
    kind,
    branch,
    repositories,
  };
}

export function createRunCompletedEvent(
  runId: string,
  counts: OutcomeCounts
): RunCompletedEvent {
  return {
    id: createEventId(),
    type: 'run_completed',
    timestamp: timestamp(),
    runId,
    ...counts,
  };
}

export function createRepoStartedEvent(runId: string, repository: string): RepoStartedEvent {
  return {
    id: createEventId(),
    type: 'repo_started',
    timestamp: timestamp(),
    runId,
    repository,
  };
}

export function createBranchCreatedEvent(
  runId: string,
  repository: string,
  branch: string,
  base: string
): BranchCreatedEvent {
  return {
    id: createEventId(),
    type: 'branch_created',
    timestamp: timestamp(),
    runId,
    repository,
    branch,
    base,
  };
}

export function createBranchSkippedEvent(
  runId: string,
  repository: string,
  branch: string,
  reason: string
): BranchSkippedEvent {
  return {
    id: createEventId(),
    type: 'branch_skipped',
    timestamp: timestamp(),
    runId,
    repository,
    branch,
    reason,
  };
}

export function createCommittedEvent(
  runId: string,
  repository: string,
  branch: string,
  message: string
): CommittedEvent {
  return {
    id: createEventId(),
    type: 'committed',
    timestamp: timestamp(),
    runId,
    repository,
    branch,
    message,
  };
}

export function createPrOpenedEvent(
  runId: string,
  repository: string,
  prUrl: string,
  prNumber: number
): PrOpenedEvent {
  return {
    id: createEventId(),
    type: 'pr_opened',
    timestamp: timestamp(),
    runId,
    repository,
    prUrl,
    prNumber,
  };
}

export function createPrMergedEvent(
  runId: string,
  repository: string,
  prUrl: string,
  prNumber: number
): PrMergedEvent {
  return {
    id: createEventId(),
    type: 'pr_merged',
    timestamp: timestamp(),
    runId,
    repository,
    prUrl,
    prNumber,
  };
}

export function createRepoFailedEvent(
  runId: string,
  repository: string,
  error: string
): RepoFailedEvent {
  return {
    id: createEventId(),
    type: 'repo_failed',
    timestamp: timestamp(),
    runId,
    repository,
    error,
  };
}
