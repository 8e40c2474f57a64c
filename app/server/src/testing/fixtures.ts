import type { ImageReference, PullRequestSummary, TagMetadata } from '@charm-fleet/shared';
import { RemoteAPIError } from '../lib/errors';
import type { ContainerRegistryClient } from '../services/container-registry';
import type { OrchestratorContext } from '../services/context';
import { EventBus } from '../services/event-bus';
import type { ComponentRegistry } from '../services/registry-service';
import { RunRecorder } from '../services/run-recorder';

export class StaticContainerRegistry implements ContainerRegistryClient {
  readonly requests: string[] = [];

  // keyed by "namespace/name"
  constructor(private readonly tags: Record<string, TagMetadata[]>) {}

  supports(image: ImageReference): boolean {
    return image.platform === 'docker.io';
  }

  async listTags(image: ImageReference): Promise<TagMetadata[]> {
    const key = `${image.namespace}/${image.name}`;
    this.requests.push(key);
    const tags = this.tags[key];
    if (!tags) {
      throw new RemoteAPIError(`No such image ${key}`, 'not_found');
    }
    return tags;
  }
}

export function tag(name: string, lastUpdated: string, status = 'active'): TagMetadata {
  return { name, lastUpdated, status, architectures: ['amd64'] };
}

export function pullRequest(overrides: Partial<PullRequestSummary> = {}): PullRequestSummary {
  return {
    repository: 'example/alpha-operators',
    number: 1,
    url: 'https://github.com/example/alpha-operators/pull/1',
    title: 'Release 1.0',
    branch: 'release-1.0',
    base: 'track/1.0',
    state: 'open',
    draft: false,
    mergeable: true,
    checks: { success: 3, failure: 0, skipped: 1, pending: 0 },
    approvals: { approved: 1, total: 1 },
    ...overrides,
  };
}

export function createTestContext(
  registry: ComponentRegistry,
  containerRegistry: ContainerRegistryClient = new StaticContainerRegistry({}),
  bus: EventBus = new EventBus()
): OrchestratorContext {
  return {
    registry,
    recorder: new RunRecorder(null, bus),
    containerRegistry,
    concurrency: 2,
    defaultBranch: 'main',
  };
}
