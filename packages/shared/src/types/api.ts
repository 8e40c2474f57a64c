import type { ComponentInfo } from './component';
import type { ImageTagDelta } from './image';
import type { FailedOutcome } from './outcome';
import type { PullRequestSummary } from './pull-request';
import type { RunEvent } from './events';

export interface VersionOverrides {
  pinChannel?: boolean;                 // default true: channel default = release ref
  requiredVersion?: string;             // terraform.required_version
  providers?: Record<string, string>;   // required_providers.<name>.version
}

// Request types
export interface CutReleaseRequest {
  branchName: string;
  title: string;
  body?: string;
  overrides?: VersionOverrides;
  dryRun?: boolean;
}

export interface MergePullRequestsRequest {
  force?: boolean;
}

export interface UpdateImagesRequest {
  branchName: string;
  title: string;
  body?: string;
  dryRun?: boolean;
}

// Response types
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface RegistryResponse {
  repositories: number;
  components: ComponentInfo[];
}

// Batch runs finish in the background; follow them by run id
export interface RunAcceptedResponse {
  runId: string;
}

export interface PullRequestsResponse {
  pullRequests: PullRequestSummary[];
  failures: FailedOutcome[];
}

export interface ImagesResponse {
  deltas: ImageTagDelta[];
  failures: FailedOutcome[];
}

export interface RunEventsResponse {
  events: RunEvent[];
}

// WebSocket message types
export type WsMessageType =
  | 'subscribe'
  | 'unsubscribe'
  | 'subscribed'
  | 'unsubscribed'
  | 'event'
  | 'error'
  | 'connected';

export interface WsMessage {
  type: WsMessageType;
  runId?: string;
  event?: RunEvent;
  error?: string;
}
