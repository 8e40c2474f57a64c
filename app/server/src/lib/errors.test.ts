import { describe, it, expect } from 'vitest';
import { CommandError, classifyRemoteError, toOutcomeError } from './errors';

function ghFailure(stderr: string): CommandError {
  return new CommandError('gh', ['pr', 'list'], 1, stderr);
}

describe('errors', () => {
  it('should classify remote failures by their output', () => {
    expect(classifyRemoteError(ghFailure('HTTP 403: API rate limit exceeded')).kind).toBe('rate_limit');
    expect(classifyRemoteError(ghFailure('HTTP 401: Bad credentials')).kind).toBe('auth');
    expect(
      classifyRemoteError(ghFailure('fatal: unable to access: Could not resolve host: github.com')).kind
    ).toBe('network');
    expect(
      classifyRemoteError(ghFailure("GraphQL: Could not resolve to a Repository with the name 'x'")).kind
    ).toBe('not_found');
    expect(classifyRemoteError(ghFailure('something odd')).kind).toBe('unknown');
  });

  it('should keep configuration pairs out of command messages', () => {
    const error = new CommandError(
      'git',
      ['-c', 'http.extraHeader=Authorization: Basic dGVzdA==', 'fetch', '--all'],
      128,
      'boom\n'
    );
    expect(error.message).toBe('git fetch failed (exit 128): boom');
  });

  it('should summarize errors for outcomes', () => {
    expect(toOutcomeError(new TypeError('bad'))).toEqual({ name: 'TypeError', message: 'bad' });
    expect(toOutcomeError('plain')).toEqual({ name: 'Error', message: 'plain' });
  });
});
