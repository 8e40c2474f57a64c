import type {
  MergeResult,
  PullRequestHandle,
  PullRequestRequest,
  PullRequestSummary,
} from '@charm-fleet/shared';

export type FileTransform = (content: string) => string | Promise<string>;

export interface PushOptions {
  force?: boolean;
}

/**
 * One remote repository together with its local working copy.
 * Implementations serialize nothing themselves; callers sharing a client go
 * through `ComponentRegistry.exclusive`.
 */
export interface RepositoryClient {
  readonly url: string;
  readonly fullName: string;
  readonly checkoutPath: string;

  ensureLocalCheckout(): Promise<void>;
  // whether the branch is published on the remote
  branchExists(name: string): Promise<boolean>;
  // replaces a local branch of that name that was never pushed
  createBranch(name: string, fromRef: string): Promise<void>;
  deleteBranch(name: string): Promise<void>;
  withBranch<T>(name: string, fn: () => Promise<T>): Promise<T>;

  hasFile(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
  updateFile(path: string, transform: FileTransform): Promise<boolean>;
  isDirty(): Promise<boolean>;
  commit(message: string): Promise<void>;
  push(branch: string, options?: PushOptions): Promise<void>;

  openPullRequest(request: PullRequestRequest): Promise<PullRequestHandle>;
  listPullRequests(branch: string): AsyncGenerator<PullRequestSummary>;
  mergePullRequest(pullRequest: PullRequestSummary): Promise<MergeResult>;
}

export type RepositoryClientFactory = (url: string) => RepositoryClient;
