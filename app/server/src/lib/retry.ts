import { setTimeout as delay } from 'timers/promises';
import { RemoteAPIError } from './errors';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

export interface RetryOptions {
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
}

export function isRetryableRemoteError(error: unknown): boolean {
  return (
    error instanceof RemoteAPIError &&
    (error.kind === 'rate_limit' || error.kind === 'network')
  );
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableRemoteError;
  const sleep = options.sleep ?? delay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const waitMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, waitMs);
      await sleep(waitMs);
    }
  }
}
