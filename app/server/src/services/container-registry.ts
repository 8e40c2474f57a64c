import type { ImagePlatform, ImageReference, TagMetadata } from '@charm-fleet/shared';
import { ParseError, RemoteAPIError, getErrorMessage, type RemoteErrorKind } from '../lib/errors';
import { isRecord, readArray, readString } from '../lib/guards';
import { createLogger } from '../lib/logger';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../lib/retry';

const log = createLogger('container-registry');

const PLATFORMS: readonly ImagePlatform[] = ['docker.io', 'ghcr.io'];
const DEFAULT_NAMESPACE = 'library';
const PAGE_SIZE = 100;

export interface ContainerRegistryClient {
  supports(image: ImageReference): boolean;
  listTags(image: ImageReference): Promise<TagMetadata[]>;
}

function isPlatform(value: string): value is ImagePlatform {
  return PLATFORMS.some((platform) => platform === value);
}

/**
 * Parses `[platform/][namespace/]name:tag`. The platform defaults to docker.io
 * and the namespace to "library".
 */
export function parseImageReference(image: string): ImageReference {
  const value = image.trim();
  if (value.includes('@')) {
    throw new ParseError(`Digest image references are not supported: ${image}`);
  }
  const colon = value.lastIndexOf(':');
  if (colon === -1 || value.slice(colon + 1).includes('/')) {
    throw new ParseError(`Image reference has no tag: ${image}`);
  }
  const tag = value.slice(colon + 1);
  const segments = value.slice(0, colon).split('/').filter((segment) => segment.length > 0);

  let platform: ImagePlatform = 'docker.io';
  if (segments.length > 1 && segments[0].includes('.')) {
    const host = segments[0];
    if (!isPlatform(host)) {
      throw new ParseError(`Unsupported image registry ${host}: ${image}`);
    }
    platform = host;
    segments.shift();
  }

  const name = segments.pop();
  if (!name || !tag) {
    throw new ParseError(`Invalid image reference: ${image}`);
  }
  return {
    platform,
    namespace: segments.length > 0 ? segments.join('/') : DEFAULT_NAMESPACE,
    name,
    tag,
  };
}

export function formatImageReference(image: ImageReference, tag: string = image.tag): string {
  return `${image.platform}/${image.namespace}/${image.name}:${tag}`;
}

// Most recently updated active tag, ignoring the floating "latest" tag
export function selectLatestTag(tags: readonly TagMetadata[]): TagMetadata | undefined {
  return tags
    .filter((tag) => tag.status === 'active' && tag.name !== 'latest')
    .sort((a, b) => Date.parse(b.lastUpdated) - Date.parse(a.lastUpdated))[0];
}

function kindForStatus(status: number): RemoteErrorKind {
  if (status === 429) return 'rate_limit';
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status >= 500) return 'network';
  return 'unknown';
}

function toTagMetadata(value: unknown): TagMetadata | null {
  if (!isRecord(value)) return null;
  const name = readString(value, 'name');
  if (!name) return null;
  return {
    name,
    lastUpdated: readString(value, 'last_updated') ?? '',
    status: readString(value, 'tag_status') ?? '',
    architectures: readArray(value, 'images')
      .map((entry) => (isRecord(entry) ? readString(entry, 'architecture') : undefined))
      .filter((arch): arch is string => arch !== undefined),
  };
}

export interface DockerHubClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<unknown>;
}

export class DockerHubClient implements ContainerRegistryClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<unknown>;

  constructor(options: DockerHubClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://registry.hub.docker.com').replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  supports(image: ImageReference): boolean {
    return image.platform === 'docker.io';
  }

  async listTags(image: ImageReference): Promise<TagMetadata[]> {
    if (!this.supports(image)) {
      throw new RemoteAPIError(`Tag listing is not available for ${image.platform}`, 'unknown');
    }
    const url = `${this.baseUrl}/v2/repositories/${image.namespace}/${image.name}/tags/?page_size=${PAGE_SIZE}`;
    const body = await withRetry(() => this.getJson(url), this.retry, {
      sleep: this.sleep,
      onRetry: (error, attempt, delayMs) => {
        log.warn({ url, attempt, delayMs, error: getErrorMessage(error) }, 'Tag listing failed, retrying');
      },
    });
    if (!isRecord(body)) {
      throw new RemoteAPIError(`Unexpected response from ${url}`, 'unknown');
    }
    return readArray(body, 'results')
      .map(toTagMetadata)
      .filter((tag): tag is TagMetadata => tag !== null);
  }

  private async getJson(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });
    } catch (error) {
      throw new RemoteAPIError(`GET ${url} failed: ${getErrorMessage(error)}`, 'network', { cause: error });
    }
    if (!response.ok) {
      throw new RemoteAPIError(`GET ${url} returned ${response.status}`, kindForStatus(response.status));
    }
    return response.json();
  }
}
