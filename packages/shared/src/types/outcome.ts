import type { PullRequestHandle } from './pull-request';

export interface OutcomeError {
  name: string;
  message: string;
}

export type RepositoryOutcome<T> =
  | { repository: string; status: 'success'; value: T }
  | { repository: string; status: 'skipped'; reason: string }
  | { repository: string; status: 'failed'; error: OutcomeError };

export interface BranchRunResult {
  branch: string;
  base: string;
  committed: boolean;
  pullRequest?: PullRequestHandle;
}

export type FailedOutcome = Extract<RepositoryOutcome<never>, { status: 'failed' }>;
