import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { PullRequestSummary } from '@charm-fleet/shared';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { BranchExistsError, CommandError, LocalCheckoutError, RemoteAPIError } from '../lib/errors';
import { FakeCommandRunner } from '../testing/fake-command-runner';
import { pullRequest } from '../testing/fixtures';
import { GitRepositoryClient, countChecks } from './git-repository-client';

const REPO_URL = 'https://github.com/example/argo-operators';
const CREDENTIALS = { username: 'fleet-bot', token: 'test-secret' };
const AUTH_HEADER = `http.extraHeader=Authorization: Basic ${Buffer.from('fleet-bot:test-secret').toString('base64')}`;

describe('GitRepositoryClient', () => {
  let dir: string;
  let checkoutPath: string;
  let runner: FakeCommandRunner;
  let sleeps: number[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'charm-fleet-git-'));
    checkoutPath = join(dir, 'example', 'argo-operators');
    runner = new FakeCommandRunner();
    sleeps = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function createClient(): GitRepositoryClient {
    return new GitRepositoryClient({
      url: `${REPO_URL}.git`,
      checkoutPath,
      credentials: CREDENTIALS,
      runner,
      retry: { maxAttempts: 3, baseDelayMs: 5, maxDelayMs: 20 },
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });
  }

  describe('ensureLocalCheckout', () => {
    it('should clone once with the credentials header', async () => {
      const client = createClient();

      await client.ensureLocalCheckout();
      await client.ensureLocalCheckout();

      expect(client.fullName).toBe('example/argo-operators');
      expect(runner.invocations('git')).toEqual([
        ['clone', REPO_URL, checkoutPath],
        ['config', 'user.name', 'fleet-bot'],
        ['config', 'user.email', 'fleet-bot@users.noreply.github.com'],
      ]);
      expect(runner.calls[0].args.slice(0, 2)).toEqual(['-c', AUTH_HEADER]);
      expect(runner.calls[0].options.cwd).toBe(join(dir, 'example'));
    });

    it('should fetch an existing checkout of the same repository', async () => {
      await mkdir(join(checkoutPath, '.git'), { recursive: true });
      runner.on('git', ['remote', 'get-url', 'origin'], `${REPO_URL}.git`);

      await createClient().ensureLocalCheckout();

      expect(runner.invocations('git')).toEqual([
        ['remote', 'get-url', 'origin'],
        ['fetch', '--all', '--prune'],
        ['config', 'user.name', 'fleet-bot'],
        ['config', 'user.email', 'fleet-bot@users.noreply.github.com'],
      ]);
    });

    it('should refuse a checkout tracking another repository', async () => {
      await mkdir(join(checkoutPath, '.git'), { recursive: true });
      runner.on('git', ['remote', 'get-url', 'origin'], 'https://github.com/example/other');

      await expect(createClient().ensureLocalCheckout()).rejects.toThrow(
        `Checkout ${checkoutPath} tracks https://github.com/example/other, expected ${REPO_URL}`
      );
    });

    it('should try again after a failed clone', async () => {
      runner.on('git', ['clone'], new CommandError('git', ['clone'], 128, 'fatal: HTTP 404'), '');
      const client = createClient();

      await expect(client.ensureLocalCheckout()).rejects.toMatchObject({ kind: 'not_found' });
      await client.ensureLocalCheckout();

      expect(runner.invocations('git').filter((args) => args[0] === 'clone')).toHaveLength(2);
    });
  });

  describe('branches', () => {
    it('should branch from the remote ref when it exists', async () => {
      runner.on('git', ['rev-parse', '--verify'], 'abc123');

      await createClient().createBranch('release-1.0', 'track/3.4');

      expect(runner.invocations('git')).toEqual([
        ['ls-remote', '--heads', 'origin', 'refs/heads/release-1.0'],
        ['branch', '--list', 'release-1.0'],
        ['rev-parse', '--verify', '--quiet', 'origin/track/3.4'],
        ['branch', '--no-track', 'release-1.0', 'origin/track/3.4'],
      ]);
    });

    it('should fall back to the local ref', async () => {
      runner.on('git', ['rev-parse', '--verify'], new CommandError('git', ['rev-parse'], 1, ''));

      await createClient().createBranch('track/3.4', 'main');

      expect(runner.invocations('git').at(-1)).toEqual(['branch', '--no-track', 'track/3.4', 'main']);
    });

    it('should replace a local branch that never reached the remote', async () => {
      runner.on('git', ['branch', '--list'], '  release-1.0');
      runner.on('git', ['rev-parse', '--verify'], 'abc123');
      const client = createClient();

      expect(await client.branchExists('release-1.0')).toBe(false);
      await client.createBranch('release-1.0', 'track/3.4');

      expect(runner.invocations('git')).toEqual([
        ['ls-remote', '--heads', 'origin', 'refs/heads/release-1.0'],
        ['ls-remote', '--heads', 'origin', 'refs/heads/release-1.0'],
        ['branch', '--list', 'release-1.0'],
        ['branch', '-D', 'release-1.0'],
        ['rev-parse', '--verify', '--quiet', 'origin/track/3.4'],
        ['branch', '--no-track', 'release-1.0', 'origin/track/3.4'],
      ]);
    });

    it('should refuse a branch that exists on the remote', async () => {
      runner.on('git', ['ls-remote'], 'abc123\trefs/heads/release-1.0');

      await expect(createClient().createBranch('release-1.0', 'track/3.4')).rejects.toBeInstanceOf(
        BranchExistsError
      );
    });

    it('should restore the previous branch when the callback fails', async () => {
      runner.on('git', ['rev-parse', '--abbrev-ref'], 'main');

      await expect(
        createClient().withBranch('release-1.0', async () => {
          throw new Error('edit failed');
        })
      ).rejects.toThrow('edit failed');

      expect(runner.invocations('git')).toEqual([
        ['rev-parse', '--abbrev-ref', 'HEAD'],
        ['checkout', 'release-1.0', '--'],
        ['checkout', '--force', 'main', '--'],
      ]);
    });

    it('should push with upstream tracking', async () => {
      await createClient().push('release-1.0', { force: true });
      expect(runner.invocations('git')).toEqual([['push', '-u', '--force', 'origin', 'release-1.0']]);
    });
  });

  describe('files', () => {
    it('should rewrite and stage a changed file', async () => {
      await mkdir(join(checkoutPath, 'terraform'), { recursive: true });
      await writeFile(join(checkoutPath, 'terraform', 'variables.tf'), 'old\n');
      const client = createClient();

      const changed = await client.updateFile('terraform/variables.tf', (content) => content.replace('old', 'new'));
      const unchanged = await client.updateFile('terraform/variables.tf', (content) => content);

      expect(changed).toBe(true);
      expect(unchanged).toBe(false);
      expect(await readFile(join(checkoutPath, 'terraform', 'variables.tf'), 'utf-8')).toBe('new\n');
      expect(runner.invocations('git')).toEqual([['add', '--', 'terraform/variables.tf']]);
    });

    it('should reject paths outside the checkout', async () => {
      await expect(createClient().readFile('../secrets.json')).rejects.toBeInstanceOf(LocalCheckoutError);
      await expect(createClient().hasFile('missing.yaml')).resolves.toBe(false);
    });

    it('should report a dirty tree from git status', async () => {
      runner.on('git', ['status'], ' M metadata.yaml');
      await expect(createClient().isDirty()).resolves.toBe(true);
    });
  });

  describe('pull requests', () => {
    it('should read the pull request URL printed by gh', async () => {
      runner.on(
        'gh',
        ['pr', 'create'],
        'Creating pull request for release-1.0 into track/3.4\n\nhttps://github.com/example/argo-operators/pull/42'
      );

      const handle = await createClient().openPullRequest({
        branch: 'release-1.0',
        base: 'track/3.4',
        title: 'Release 1.0',
        body: 'Cutting new release',
      });

      expect(handle).toEqual({ number: 42, url: 'https://github.com/example/argo-operators/pull/42' });
      expect(runner.calls[0]).toEqual({
        command: 'gh',
        args: [
          'pr', 'create',
          '--repo', 'example/argo-operators',
          '--base', 'track/3.4',
          '--head', 'release-1.0',
          '--title', 'Release 1.0',
          '--body', 'Cutting new release',
        ],
        options: { env: { GH_TOKEN: 'test-secret' } },
      });
    });

    it('should look the pull request up when gh prints no URL', async () => {
      runner.on('gh', ['pr', 'view'], '{"number": 43, "url": "https://github.com/example/argo-operators/pull/43"}');

      const handle = await createClient().openPullRequest({
        branch: 'release-1.0',
        base: 'track/3.4',
        title: 'Release 1.0',
        body: '',
      });

      expect(handle).toEqual({ number: 43, url: 'https://github.com/example/argo-operators/pull/43' });
    });

    it('should summarize pull requests opened from the branch', async () => {
      runner.on(
        'gh',
        ['pr', 'list'],
        JSON.stringify([
          {
            number: 42,
            url: 'https://github.com/example/argo-operators/pull/42',
            title: 'Release 1.0',
            state: 'OPEN',
            isDraft: false,
            headRefName: 'release-1.0',
            baseRefName: 'track/3.4',
          },
          { number: 40, headRefName: 'release-1.0-docs', state: 'OPEN' },
        ])
      );
      runner.on(
        'gh',
        ['pr', 'view', '42'],
        JSON.stringify({
          mergeable: 'MERGEABLE',
          statusCheckRollup: [{ conclusion: 'SUCCESS' }, { conclusion: 'SKIPPED' }, { state: 'PENDING' }],
          reviews: [{ state: 'APPROVED' }, { state: 'COMMENTED' }],
        })
      );

      const summaries: PullRequestSummary[] = [];
      for await (const summary of createClient().listPullRequests('release-1.0')) {
        summaries.push(summary);
      }

      expect(summaries).toEqual([
        {
          repository: 'example/argo-operators',
          number: 42,
          url: 'https://github.com/example/argo-operators/pull/42',
          title: 'Release 1.0',
          branch: 'release-1.0',
          base: 'track/3.4',
          state: 'open',
          draft: false,
          mergeable: true,
          checks: { success: 1, failure: 0, skipped: 1, pending: 1 },
          approvals: { approved: 1, total: 2 },
        },
      ]);
      expect(runner.invocations('gh').map((args) => args.slice(0, 3))).toEqual([
        ['pr', 'list', '--repo'],
        ['pr', 'view', '42'],
      ]);
    });

    it('should retry rate limited calls with backoff', async () => {
      runner.on(
        'gh',
        ['pr', 'list'],
        new CommandError('gh', ['pr', 'list'], 1, 'API rate limit exceeded'),
        new CommandError('gh', ['pr', 'list'], 1, 'API rate limit exceeded'),
        '[]'
      );

      const summaries: PullRequestSummary[] = [];
      for await (const summary of createClient().listPullRequests('release-1.0')) {
        summaries.push(summary);
      }

      expect(summaries).toEqual([]);
      expect(sleeps).toEqual([5, 10]);
    });

    it('should not retry authentication failures', async () => {
      runner.on('gh', ['pr', 'merge'], new CommandError('gh', ['pr', 'merge'], 1, 'HTTP 401: Bad credentials'));

      const error = await createClient()
        .mergePullRequest(pullRequest({ repository: 'example/argo-operators' }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteAPIError);
      expect(error).toMatchObject({ kind: 'auth' });
      expect(sleeps).toEqual([]);
    });

    it('should squash merge with the pull request title', async () => {
      const result = await createClient().mergePullRequest(
        pullRequest({ number: 42, url: 'https://github.com/example/argo-operators/pull/42' })
      );

      expect(result).toEqual({
        number: 42,
        url: 'https://github.com/example/argo-operators/pull/42',
        merged: true,
      });
      expect(runner.invocations('gh')).toEqual([
        [
          'pr', 'merge', '42',
          '--repo', 'example/argo-operators',
          '--squash',
          '--subject', 'Release 1.0 (#42)',
          '--body', 'merged remotely by charm-fleet',
        ],
      ]);
    });
  });
});

describe('countChecks', () => {
  it('should count check runs and commit statuses', () => {
    expect(
      countChecks([
        { conclusion: 'SUCCESS' },
        { conclusion: 'FAILURE' },
        { conclusion: 'NEUTRAL' },
        { conclusion: '', state: 'SUCCESS' },
        { state: 'EXPECTED' },
        'not-a-check',
      ])
    ).toEqual({ success: 2, failure: 1, skipped: 1, pending: 1 });
  });
});
