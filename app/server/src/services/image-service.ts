import type {
  BranchRunResult,
  FailedOutcome,
  ImageTagDelta,
  UpdateImagesRequest,
} from '@charm-fleet/shared';
import { getErrorMessage, toOutcomeError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { mapWithConcurrency } from '../lib/pool';
import type { OrchestratorContext } from './context';
import { parseImageReference, selectLatestTag, type ContainerRegistryClient } from './container-registry';
import { setImageSource } from './metadata-service';
import type { RepositoryGroup } from './registry-service';
import type { RunStartListener } from './run-recorder';
import { runBranchOperation, type BatchRun } from './release-service';

const log = createLogger('images');

export interface ImageSummary {
  deltas: ImageTagDelta[];
  failures: FailedOutcome[];
}

// Memoizes the latest tag per image for the duration of one summary
class LatestTagCache {
  private readonly entries = new Map<string, Promise<string | undefined>>();

  constructor(private readonly registry: ContainerRegistryClient) {}

  latest(image: string): Promise<string | undefined> {
    const reference = parseImageReference(image);
    const key = `${reference.platform}/${reference.namespace}/${reference.name}`;
    let entry = this.entries.get(key);
    if (!entry) {
      entry = this.registry.listTags(reference).then((tags) => selectLatestTag(tags)?.name);
      this.entries.set(key, entry);
    }
    return entry;
  }
}

async function groupDeltas(
  group: RepositoryGroup,
  cache: LatestTagCache,
  registry: ContainerRegistryClient
): Promise<ImageTagDelta[]> {
  const deltas: ImageTagDelta[] = [];
  for (const component of group.components) {
    const local = component.local;
    if (!local) {
      log.debug({ component: component.name }, 'No local metadata, skipping images');
      continue;
    }
    for (const [resource, image] of Object.entries(local.images)) {
      const reference = parseImageReference(image);
      if (!registry.supports(reference)) {
        log.warn({ component: component.name, image }, 'Registry not supported, skipping image');
        continue;
      }
      const latestTag = await cache.latest(image);
      if (latestTag && latestTag !== reference.tag) {
        deltas.push({
          repository: group.client.fullName,
          component: component.name,
          resource,
          image,
          declaredTag: reference.tag,
          latestTag,
        });
      }
    }
  }
  return deltas;
}

/**
 * Compares the image tags declared in each charm's metadata with the latest
 * tag published in the container registry. Components need local metadata
 * (see `ComponentRegistry.loadLocalMetadata`).
 */
export async function summarizeImages(context: OrchestratorContext): Promise<ImageSummary> {
  const cache = new LatestTagCache(context.containerRegistry);
  const deltas: ImageTagDelta[] = [];
  const failures: FailedOutcome[] = [];

  const results = await mapWithConcurrency<
    RepositoryGroup,
    { group: RepositoryGroup; deltas: ImageTagDelta[] } | { group: RepositoryGroup; error: unknown }
  >(context.registry.groups(), context.concurrency, async (group) => {
    try {
      return { group, deltas: await groupDeltas(group, cache, context.containerRegistry) };
    } catch (error) {
      log.error({ repository: group.client.fullName, error: getErrorMessage(error) }, 'Image comparison failed');
      return { group, error };
    }
  });

  for (const result of results) {
    if ('deltas' in result) {
      deltas.push(...result.deltas);
    } else {
      failures.push({
        repository: result.group.client.fullName,
        status: 'failed',
        error: toOutcomeError(result.error),
      });
    }
  }

  return { deltas, failures };
}

/**
 * Refreshes the local metadata of every component, then summarizes. Repositories
 * whose metadata cannot be read are reported as failures.
 */
export async function compareImages(context: OrchestratorContext): Promise<ImageSummary> {
  const metadataFailures = await context.registry.loadLocalMetadata(context.concurrency);
  const summary = await summarizeImages(context);
  const failed = new Set(summary.failures.map((failure) => failure.repository));
  return {
    deltas: summary.deltas,
    failures: [
      ...metadataFailures.filter((failure) => !failed.has(failure.repository)),
      ...summary.failures,
    ],
  };
}

export function replaceTag(image: string, tag: string): string {
  return `${image.slice(0, image.lastIndexOf(':'))}:${tag}`;
}

export interface UpdateImageTagsOptions extends UpdateImagesRequest {
  // reuses an earlier summary instead of querying the container registry again
  summary?: ImageSummary;
  onStart?: RunStartListener;
}

/**
 * Opens one pull request per repository whose charms declare outdated images,
 * rewriting the `upstream-source` of each outdated resource.
 */
export async function updateImageTags(
  context: OrchestratorContext,
  options: UpdateImageTagsOptions
): Promise<BatchRun<BranchRunResult>> {
  const { deltas } = options.summary ?? (await summarizeImages(context));
  const outdated = new Set(deltas.map((delta) => delta.repository));
  const groups = context.registry.groups().filter((group) => outdated.has(group.client.fullName));

  return runBranchOperation(
    context,
    {
      branchName: options.branchName,
      title: options.title,
      body: options.body ?? 'Update container images to the latest published tags',
      dryRun: options.dryRun,
      kind: 'update_images',
      groups,
      onStart: options.onStart,
    },
    async (client, group) => {
      for (const delta of deltas) {
        if (delta.repository !== client.fullName) continue;
        const component = group.components.find((candidate) => candidate.name === delta.component);
        const metadataFile = component?.local?.metadataFile;
        if (!metadataFile) continue;
        await client.updateFile(metadataFile, (content) =>
          setImageSource(content, delta.resource, replaceTag(delta.image, delta.latestTag))
        );
      }
    }
  );
}
