import type { OutcomeError } from '@charm-fleet/shared';

export class ParseError extends Error {
  constructor(message: string, readonly file?: string, options?: ErrorOptions) {
    super(file ? `${message} (file: ${file})` : message, options);
    this.name = 'ParseError';
  }
}

export class BranchExistsError extends Error {
  constructor(readonly repository: string, readonly branch: string) {
    super(`Branch ${branch} already exists in ${repository}`);
    this.name = 'BranchExistsError';
  }
}

export type RemoteErrorKind = 'auth' | 'rate_limit' | 'network' | 'not_found' | 'unknown';

export class RemoteAPIError extends Error {
  constructor(message: string, readonly kind: RemoteErrorKind, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemoteAPIError';
  }
}

export class LocalCheckoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LocalCheckoutError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// first plain argument; `-c key=value` pairs never end up in messages
function subcommandOf(args: readonly string[]): string {
  return args.find((arg) => !arg.startsWith('-') && !arg.includes('=')) ?? '';
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    super(`${command} ${subcommandOf(args)} failed (exit ${exitCode}): ${truncateMessage(stderr.trim())}`);
    this.name = 'CommandError';
  }
}

export function truncateMessage(message: string, maxLength = 500): string {
  if (!message) return 'Unknown error';
  if (message.length <= maxLength) return message;
  return message.slice(0, maxLength) + '...(truncated)';
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || 'Error occurred (no message)';
  }
  return String(error) || 'Unknown error';
}

export function toOutcomeError(error: unknown): OutcomeError {
  return {
    name: error instanceof Error ? error.name : 'Error',
    message: truncateMessage(getErrorMessage(error)),
  };
}

const RATE_LIMIT_PATTERN = /rate limit|HTTP 429/i;
const AUTH_PATTERN = /HTTP 401|Bad credentials|authentication (failed|required)|gh auth login|HTTP 403/i;
const NOT_FOUND_PATTERN = /HTTP 404|Could not resolve to a|not found/i;
const NETWORK_PATTERN = /could not resolve host|connection (refused|reset|timed out)|ETIMEDOUT|ECONNRESET|ECONNREFUSED|EAI_AGAIN|network is unreachable/i;

// Maps a failed git/gh invocation against the remote to a RemoteAPIError
export function classifyRemoteError(error: CommandError): RemoteAPIError {
  const text = error.stderr;
  let kind: RemoteErrorKind = 'unknown';
  if (RATE_LIMIT_PATTERN.test(text)) kind = 'rate_limit';
  else if (AUTH_PATTERN.test(text)) kind = 'auth';
  else if (NETWORK_PATTERN.test(text)) kind = 'network';
  else if (NOT_FOUND_PATTERN.test(text)) kind = 'not_found';
  return new RemoteAPIError(error.message, kind, { cause: error });
}
