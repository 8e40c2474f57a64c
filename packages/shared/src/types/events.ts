export type RunKind = 'cut_release' | 'branch_operation' | 'merge' | 'update_images';

export type RunEventType =
  | 'run_started'
  | 'run_completed'
  | 'repo_started'
  | 'branch_created'
  | 'branch_skipped'
  | 'committed'
  | 'pr_opened'
  | 'pr_merged'
  | 'repo_failed';

export interface BaseRunEvent {
  id: string;
  type: RunEventType;
  timestamp: string;
  runId: string;
  repository?: string;
}

export interface RunStartedEvent extends BaseRunEvent {
  type: 'run_started';
  kind: RunKind;
  branch?: string;
  repositories: number;
}

export interface RunCompletedEvent extends BaseRunEvent {
  type: 'run_completed';
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface RepoStartedEvent extends BaseRunEvent {
  type: 'repo_started';
  repository: string;
}

export interface BranchCreatedEvent extends BaseRunEvent {
  type: 'branch_created';
  repository: string;
  branch: string;
  base: string;
}

export interface BranchSkippedEvent extends BaseRunEvent {
  type: 'branch_skipped';
  repository: string;
  branch: string;
  reason: string;
}

export interface CommittedEvent extends BaseRunEvent {
  type: 'committed';
  repository: string;
  branch: string;
  message: string;
}

export interface PrOpenedEvent extends BaseRunEvent {
  type: 'pr_opened';
  repository: string;
  prUrl: string;
  prNumber: number;
}

export interface PrMergedEvent extends BaseRunEvent {
  type: 'pr_merged';
  repository: string;
  prUrl: string;
  prNumber: number;
}

export interface RepoFailedEvent extends BaseRunEvent {
  type: 'repo_failed';
  repository: string;
  error: string;
}

export type RunEvent =
  | RunStartedEvent
  | RunCompletedEvent
  | RepoStartedEvent
  | BranchCreatedEvent
  | BranchSkippedEvent
  | CommittedEvent
  | PrOpenedEvent
  | PrMergedEvent
  | RepoFailedEvent;
