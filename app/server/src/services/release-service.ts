import { posix } from 'path';
import type {
  BranchRunResult,
  CutReleaseRequest,
  RepositoryOutcome,
  RunKind,
  VersionOverrides,
} from '@charm-fleet/shared';
import { BranchExistsError, getErrorMessage, toOutcomeError } from '../lib/errors';
import {
  createBranchCreatedEvent,
  createBranchSkippedEvent,
  createCommittedEvent,
  createPrOpenedEvent,
  createRepoFailedEvent,
  createRepoStartedEvent,
} from '../lib/events';
import { setProviderVersions, setVariableAttribute } from '../lib/hcl';
import { createLogger } from '../lib/logger';
import { countOutcomes } from '../lib/outcome';
import { mapWithConcurrency } from '../lib/pool';
import type { OrchestratorContext } from './context';
import { CHANNEL_VARIABLE, type RepositoryGroup } from './registry-service';
import type { RepositoryClient } from './repository-client';
import type { RunHandle, RunStartListener } from './run-recorder';

const log = createLogger('release');

export const NO_CHANGES = 'no changes';

export interface BatchRun<T> {
  runId: string;
  outcomes: RepositoryOutcome<T>[];
}

export interface EditOptions {
  dryRun: boolean;
}

// Mutates the working copy of one repository; runs with the new branch checked out
export type RepositoryEdit = (
  client: RepositoryClient,
  group: RepositoryGroup,
  options: EditOptions
) => Promise<void>;

type PerGroup = string | ((group: RepositoryGroup) => string);

export interface BranchOperationOptions {
  branchName: string;
  title: string;
  body?: PerGroup;
  commitMessage?: PerGroup;
  dryRun?: boolean;
  kind?: RunKind;
  // defaults to every repository of the registry
  groups?: RepositoryGroup[];
  // runs after the existing-branch check and before the branch is created
  prepare?: (group: RepositoryGroup, run: RunHandle) => Promise<void>;
  onStart?: RunStartListener;
}

export interface CutReleaseOptions extends CutReleaseRequest {
  defaultBranch?: string;
  onStart?: RunStartListener;
}

function resolve(value: PerGroup, group: RepositoryGroup): string {
  return typeof value === 'function' ? value(group) : value;
}

async function runForRepository(
  group: RepositoryGroup,
  run: RunHandle,
  options: BranchOperationOptions,
  edit: RepositoryEdit
): Promise<RepositoryOutcome<BranchRunResult>> {
  const { client, ref: base } = group;
  const { branchName } = options;
  const repository = client.fullName;
  const dryRun = options.dryRun ?? false;

  await run.record(createRepoStartedEvent(run.id, repository));

  let created = false;
  try {
    await client.ensureLocalCheckout();
    if (await client.branchExists(branchName)) {
      throw new BranchExistsError(repository, branchName);
    }
    if (options.prepare) {
      await options.prepare(group, run);
    }

    await client.createBranch(branchName, base);
    created = true;
    await run.record(createBranchCreatedEvent(run.id, repository, branchName, base));

    const message = resolve(options.commitMessage ?? options.title, group);
    const committed = await client.withBranch(branchName, async () => {
      await edit(client, group, { dryRun });
      if (!(await client.isDirty())) {
        return false;
      }
      await client.commit(message);
      return true;
    });

    if (!committed) {
      await client.deleteBranch(branchName);
      await run.record(createBranchSkippedEvent(run.id, repository, branchName, NO_CHANGES));
      log.info({ repository, branch: branchName }, 'No changes, branch removed');
      return { repository, status: 'skipped', reason: NO_CHANGES };
    }
    await run.record(createCommittedEvent(run.id, repository, branchName, message));

    if (dryRun) {
      return { repository, status: 'success', value: { branch: branchName, base, committed: true } };
    }

    await client.push(branchName);
    const pullRequest = await client.openPullRequest({
      branch: branchName,
      base,
      title: options.title,
      body: resolve(options.body ?? '', group),
    });
    await run.record(createPrOpenedEvent(run.id, repository, pullRequest.url, pullRequest.number));
    log.info({ repository, pr: pullRequest.url }, 'Pull request opened');

    return {
      repository,
      status: 'success',
      value: { branch: branchName, base, committed: true, pullRequest },
    };
  } catch (error) {
    if (error instanceof BranchExistsError) {
      log.warn({ repository, branch: branchName }, 'Branch already exists, skipping repository');
      await run.record(createBranchSkippedEvent(run.id, repository, branchName, error.message));
      return { repository, status: 'skipped', reason: error.message };
    }
    const message = getErrorMessage(error);
    log.error({ repository, branch: branchName, error: message }, 'Branch operation failed');
    if (created) {
      await removeBranch(client, branchName);
    }
    await run.record(createRepoFailedEvent(run.id, repository, message));
    return { repository, status: 'failed', error: toOutcomeError(error) };
  }
}

// a failed run must not leave its branch behind for the next attempt
async function removeBranch(client: RepositoryClient, branchName: string): Promise<void> {
  try {
    await client.deleteBranch(branchName);
  } catch (error) {
    log.warn(
      { repository: client.fullName, branch: branchName, error: getErrorMessage(error) },
      'Failed to remove branch of failed run'
    );
  }
}

/**
 * Creates `branchName` in every repository, applies `edit`, commits, pushes and
 * opens a pull request against the repository's release branch. Each
 * repository is handled independently and holds its checkout exclusively while
 * it runs. Nothing pushed is rolled back.
 */
export async function runBranchOperation(
  context: OrchestratorContext,
  options: BranchOperationOptions,
  edit: RepositoryEdit
): Promise<BatchRun<BranchRunResult>> {
  const groups = options.groups ?? context.registry.groups();
  const run = await context.recorder.start(options.kind ?? 'branch_operation', {
    branch: options.branchName,
    repositories: groups.length,
    onStart: options.onStart,
  });

  const outcomes = await mapWithConcurrency(groups, context.concurrency, (group) =>
    context.registry.exclusive(group.client, () => runForRepository(group, run, options, edit))
  );

  await run.complete(outcomes);
  log.info({ runId: run.id, ...countOutcomes(outcomes) }, 'Branch operation finished');
  return { runId: run.id, outcomes };
}

// track/3.4 -> 3.4/stable; other refs are used as the channel unchanged
export function channelForRef(ref: string): string {
  const track = /^track\/(.+)$/.exec(ref);
  return track ? `${track[1]}/stable` : ref;
}

export async function applyVersionOverrides(
  client: RepositoryClient,
  group: RepositoryGroup,
  overrides: VersionOverrides = {}
): Promise<void> {
  const pinChannel = overrides.pinChannel ?? true;
  const pinVersions = overrides.requiredVersion !== undefined || overrides.providers !== undefined;

  for (const component of group.components) {
    for (const reference of component.references) {
      const variablesFile = posix.join(reference.subpath, 'variables.tf');
      if (pinChannel && (await client.hasFile(variablesFile))) {
        const channel = channelForRef(reference.ref);
        await client.updateFile(variablesFile, (content) =>
          setVariableAttribute(content, CHANNEL_VARIABLE, 'default', channel)
        );
      }

      const versionsFile = posix.join(reference.subpath, 'versions.tf');
      if (pinVersions && (await client.hasFile(versionsFile))) {
        await client.updateFile(versionsFile, (content) =>
          setProviderVersions(content, {
            requiredVersion: overrides.requiredVersion,
            providers: overrides.providers,
          })
        );
      }
    }
  }
}

/**
 * Cuts the release branch of every repository (from the default branch, when
 * missing) and opens a pull request pinning the charms to that release.
 */
export async function cutRelease(
  context: OrchestratorContext,
  options: CutReleaseOptions
): Promise<BatchRun<BranchRunResult>> {
  const defaultBranch = options.defaultBranch ?? context.defaultBranch;
  const dryRun = options.dryRun ?? false;

  return runBranchOperation(
    context,
    {
      branchName: options.branchName,
      title: options.title,
      body: options.body ?? ((group) => `Cutting new release for branch ${group.ref}`),
      commitMessage: (group) =>
        `Update tracks for ${group.components.map((component) => component.name).join(', ')}`,
      dryRun,
      kind: 'cut_release',
      onStart: options.onStart,
      prepare: async (group, run) => {
        const { client, ref } = group;
        if (await client.branchExists(ref)) {
          return;
        }
        await client.createBranch(ref, defaultBranch);
        await run.record(createBranchCreatedEvent(run.id, client.fullName, ref, defaultBranch));
        if (!dryRun) {
          await client.push(ref);
        }
      },
    },
    (client, group) => applyVersionOverrides(client, group, options.overrides)
  );
}
