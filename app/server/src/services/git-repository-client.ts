import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'path';
import type {
  CheckCounts,
  GitCredentials,
  MergeResult,
  PullRequestHandle,
  PullRequestRequest,
  PullRequestState,
  PullRequestSummary,
} from '@charm-fleet/shared';
import {
  BranchExistsError,
  CommandError,
  LocalCheckoutError,
  RemoteAPIError,
  classifyRemoteError,
  getErrorMessage,
} from '../lib/errors';
import { SpawnCommandRunner, type CommandRunner } from '../lib/exec';
import { getRepositoryFullName, normalizeRepositoryUrl } from '../lib/github';
import { isRecord, readArray, readNumber, readString } from '../lib/guards';
import { createLogger } from '../lib/logger';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../lib/retry';
import type { FileTransform, PushOptions, RepositoryClient } from './repository-client';

const log = createLogger('git-repository-client');

const PULL_URL_PATTERN = /^https?:\/\/\S+\/pull\/(\d+)$/;
const MERGE_BODY = 'merged remotely by charm-fleet';
const PR_LIST_FIELDS = 'number,url,title,state,isDraft,headRefName,baseRefName';
const PR_DETAIL_FIELDS = 'mergeable,statusCheckRollup,reviews';

const FAILED_CONCLUSIONS = new Set([
  'FAILURE',
  'ERROR',
  'TIMED_OUT',
  'CANCELLED',
  'ACTION_REQUIRED',
  'STARTUP_FAILURE',
]);
const SKIPPED_CONCLUSIONS = new Set(['SKIPPED', 'NEUTRAL']);

export interface GitRepositoryClientOptions {
  url: string;
  checkoutPath: string;
  credentials: GitCredentials;
  runner?: CommandRunner;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<unknown>;
}

function toPullRequestState(value: string | undefined): PullRequestState {
  switch (value) {
    case 'OPEN':
      return 'open';
    case 'MERGED':
      return 'merged';
    default:
      return 'closed';
  }
}

export function countChecks(rollup: unknown[]): CheckCounts {
  const counts: CheckCounts = { success: 0, failure: 0, skipped: 0, pending: 0 };
  for (const check of rollup) {
    if (!isRecord(check)) continue;
    // check runs report a conclusion, commit statuses a state
    const result = readString(check, 'conclusion') || readString(check, 'state') || '';
    if (result === 'SUCCESS') counts.success++;
    else if (FAILED_CONCLUSIONS.has(result)) counts.failure++;
    else if (SKIPPED_CONCLUSIONS.has(result)) counts.skipped++;
    else counts.pending++;
  }
  return counts;
}

/**
 * Builds a summary from one `gh pr list` entry and its `gh pr view` details.
 */
export function toPullRequestSummary(
  repository: string,
  listing: Record<string, unknown>,
  details: Record<string, unknown>
): PullRequestSummary {
  const reviews = readArray(details, 'reviews').filter(isRecord);
  return {
    repository,
    number: readNumber(listing, 'number') ?? 0,
    url: readString(listing, 'url') ?? '',
    title: readString(listing, 'title') ?? '',
    branch: readString(listing, 'headRefName') ?? '',
    base: readString(listing, 'baseRefName') ?? '',
    state: toPullRequestState(readString(listing, 'state')),
    draft: listing.isDraft === true,
    mergeable: readString(details, 'mergeable') === 'MERGEABLE',
    checks: countChecks(readArray(details, 'statusCheckRollup')),
    approvals: {
      approved: reviews.filter((review) => review.state === 'APPROVED').length,
      total: reviews.length,
    },
  };
}

function parseJson(output: string, what: string): unknown {
  try {
    return JSON.parse(output);
  } catch (error) {
    throw new RemoteAPIError(`Unexpected ${what} output: ${getErrorMessage(error)}`, 'unknown', {
      cause: error,
    });
  }
}

export class GitRepositoryClient implements RepositoryClient {
  readonly url: string;
  readonly fullName: string;
  readonly checkoutPath: string;

  private readonly credentials: GitCredentials;
  private readonly runner: CommandRunner;
  private readonly retry: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<unknown>;
  private checkout: Promise<void> | null = null;

  constructor(options: GitRepositoryClientOptions) {
    this.url = normalizeRepositoryUrl(options.url);
    this.fullName = getRepositoryFullName(this.url);
    this.checkoutPath = options.checkoutPath;
    this.credentials = options.credentials;
    this.runner = options.runner ?? new SpawnCommandRunner();
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  ensureLocalCheckout(): Promise<void> {
    if (!this.checkout) {
      this.checkout = this.prepareCheckout().catch((error: unknown) => {
        this.checkout = null;
        throw error;
      });
    }
    return this.checkout;
  }

  // only branches published on origin count; local leftovers are replaced by createBranch
  async branchExists(name: string): Promise<boolean> {
    const remote = await this.remoteGit(['ls-remote', '--heads', 'origin', `refs/heads/${name}`]);
    return remote.length > 0;
  }

  async createBranch(name: string, fromRef: string): Promise<void> {
    if (await this.branchExists(name)) {
      throw new BranchExistsError(this.fullName, name);
    }
    if (await this.git(['branch', '--list', name])) {
      log.info({ repository: this.fullName, branch: name }, 'Removing unpublished local branch');
      await this.git(['branch', '-D', name]);
    }
    const remoteRef = `origin/${fromRef}`;
    const base = (await this.refExists(remoteRef)) ? remoteRef : fromRef;
    await this.git(['branch', '--no-track', name, base]);
    log.info({ repository: this.fullName, branch: name, base }, 'Branch created');
  }

  async deleteBranch(name: string): Promise<void> {
    await this.git(['branch', '-D', name]);
  }

  async withBranch<T>(name: string, fn: () => Promise<T>): Promise<T> {
    const previous = await this.git(['rev-parse', '--abbrev-ref', 'HEAD']);
    await this.git(['checkout', name, '--']);
    try {
      return await fn();
    } finally {
      await this.git(['checkout', '--force', previous, '--']);
    }
  }

  async hasFile(path: string): Promise<boolean> {
    return existsSync(this.resolvePath(path));
  }

  async readFile(path: string): Promise<string> {
    try {
      return await readFile(this.resolvePath(path), 'utf-8');
    } catch (error) {
      if (error instanceof LocalCheckoutError) throw error;
      throw new LocalCheckoutError(`Cannot read ${path} in ${this.fullName}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async updateFile(path: string, transform: FileTransform): Promise<boolean> {
    const content = await this.readFile(path);
    const updated = await transform(content);
    if (updated === content) {
      return false;
    }
    await writeFile(this.resolvePath(path), updated, 'utf-8');
    await this.git(['add', '--', path]);
    return true;
  }

  async isDirty(): Promise<boolean> {
    const status = await this.git(['status', '--porcelain']);
    return status.length > 0;
  }

  async commit(message: string): Promise<void> {
    await this.git(['add', '-A', '.']);
    await this.git(['commit', '-m', message]);
  }

  async push(branch: string, options: PushOptions = {}): Promise<void> {
    const args = ['push', '-u'];
    if (options.force) {
      args.push('--force');
    }
    await this.remoteGit([...args, 'origin', branch]);
  }

  async openPullRequest(request: PullRequestRequest): Promise<PullRequestHandle> {
    const output = await this.gh([
      'pr', 'create',
      '--repo', this.fullName,
      '--base', request.base,
      '--head', request.branch,
      '--title', request.title,
      '--body', request.body,
    ]);

    const url = output
      .split('\n')
      .map((line) => line.trim())
      .reverse()
      .find((line) => PULL_URL_PATTERN.test(line));
    const match = url ? PULL_URL_PATTERN.exec(url) : null;
    if (url && match) {
      return { url, number: Number(match[1]) };
    }

    const view = parseJson(
      await this.gh(['pr', 'view', request.branch, '--repo', this.fullName, '--json', 'number,url']),
      'gh pr view'
    );
    const number = isRecord(view) ? readNumber(view, 'number') : undefined;
    const viewUrl = isRecord(view) ? readString(view, 'url') : undefined;
    if (number === undefined || viewUrl === undefined) {
      throw new RemoteAPIError(`Could not determine the pull request opened for ${request.branch}`, 'unknown');
    }
    return { number, url: viewUrl };
  }

  async *listPullRequests(branch: string): AsyncGenerator<PullRequestSummary> {
    const listing = parseJson(
      await this.gh([
        'pr', 'list',
        '--repo', this.fullName,
        '--head', branch,
        '--state', 'all',
        '--json', PR_LIST_FIELDS,
        '--limit', '100',
      ]),
      'gh pr list'
    );
    if (!Array.isArray(listing)) {
      throw new RemoteAPIError('Unexpected gh pr list output: not a list', 'unknown');
    }

    for (const entry of listing) {
      if (!isRecord(entry) || readString(entry, 'headRefName') !== branch) continue;
      const number = readNumber(entry, 'number');
      if (number === undefined) continue;

      // details are fetched only when the consumer asks for this entry
      const details = parseJson(
        await this.gh(['pr', 'view', String(number), '--repo', this.fullName, '--json', PR_DETAIL_FIELDS]),
        'gh pr view'
      );
      yield toPullRequestSummary(this.fullName, entry, isRecord(details) ? details : {});
    }
  }

  async mergePullRequest(pullRequest: PullRequestSummary): Promise<MergeResult> {
    await this.gh([
      'pr', 'merge', String(pullRequest.number),
      '--repo', this.fullName,
      '--squash',
      '--subject', `${pullRequest.title} (#${pullRequest.number})`,
      '--body', MERGE_BODY,
    ]);
    log.info({ repository: this.fullName, pr: pullRequest.number }, 'Pull request merged');
    return { number: pullRequest.number, url: pullRequest.url, merged: true };
  }

  private async prepareCheckout(): Promise<void> {
    if (!existsSync(resolve(this.checkoutPath, '.git'))) {
      const parent = dirname(this.checkoutPath);
      await mkdir(parent, { recursive: true });
      log.info({ repository: this.fullName, path: this.checkoutPath }, 'Cloning repository');
      await this.remoteGit(['clone', this.url, this.checkoutPath], parent);
    } else {
      const origin = await this.git(['remote', 'get-url', 'origin']);
      if (normalizeRepositoryUrl(origin) !== this.url) {
        throw new LocalCheckoutError(
          `Checkout ${this.checkoutPath} tracks ${origin}, expected ${this.url}`
        );
      }
      await this.remoteGit(['fetch', '--all', '--prune']);
    }
    await this.git(['config', 'user.name', this.credentials.username]);
    await this.git(['config', 'user.email', `${this.credentials.username}@users.noreply.github.com`]);
  }

  private async refExists(ref: string): Promise<boolean> {
    try {
      await this.git(['rev-parse', '--verify', '--quiet', ref]);
      return true;
    } catch (error) {
      if (error instanceof LocalCheckoutError) {
        return false;
      }
      throw error;
    }
  }

  private resolvePath(path: string): string {
    const full = resolve(this.checkoutPath, path);
    const rel = relative(this.checkoutPath, full);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new LocalCheckoutError(`Path ${path} escapes the checkout of ${this.fullName}`);
    }
    return full;
  }

  private authHeader(): string {
    const basic = Buffer.from(`${this.credentials.username}:${this.credentials.token}`).toString('base64');
    return `http.extraHeader=Authorization: Basic ${basic}`;
  }

  private async git(args: string[]): Promise<string> {
    try {
      return await this.runner.run('git', args, { cwd: this.checkoutPath });
    } catch (error) {
      throw new LocalCheckoutError(`${getErrorMessage(error)} (${this.fullName})`, { cause: error });
    }
  }

  private remoteGit(args: string[], cwd: string = this.checkoutPath): Promise<string> {
    return this.remote(() => this.runner.run('git', ['-c', this.authHeader(), ...args], { cwd }));
  }

  private gh(args: string[]): Promise<string> {
    return this.remote(() =>
      this.runner.run('gh', args, { env: { GH_TOKEN: this.credentials.token } })
    );
  }

  private remote(call: () => Promise<string>): Promise<string> {
    return withRetry(
      async () => {
        try {
          return await call();
        } catch (error) {
          throw error instanceof CommandError ? classifyRemoteError(error) : error;
        }
      },
      this.retry,
      {
        sleep: this.sleep,
        onRetry: (error, attempt, delayMs) => {
          log.warn(
            { repository: this.fullName, attempt, delayMs, error: getErrorMessage(error) },
            'Remote call failed, retrying'
          );
        },
      }
    );
  }
}
