export type PullRequestState = 'open' | 'closed' | 'merged';

export interface CheckCounts {
  success: number;
  failure: number;
  skipped: number;
  pending: number;
}

export interface ApprovalCounts {
  approved: number;
  total: number;
}

export interface PullRequestHandle {
  number: number;
  url: string;
}

export interface PullRequestSummary extends PullRequestHandle {
  repository: string;
  branch: string;
  base: string;
  title: string;
  state: PullRequestState;
  draft: boolean;
  mergeable: boolean;
  checks: CheckCounts;
  approvals: ApprovalCounts;
}

export interface PullRequestRequest {
  branch: string;
  base: string;
  title: string;
  body: string;
}

export interface MergeResult {
  number: number;
  url: string;
  merged: boolean;
}
