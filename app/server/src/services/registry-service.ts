import { posix } from 'path';
import type {
  ComponentInfo,
  ComponentReference,
  DumpedRepository,
  FailedOutcome,
  LocalCharmMetadata,
  RegistryDump,
} from '@charm-fleet/shared';
import { ParseError, getErrorMessage, toOutcomeError } from '../lib/errors';
import { normalizeRepositoryUrl } from '../lib/github';
import { isRecord, readArray, readString } from '../lib/guards';
import { getVariableDefault } from '../lib/hcl';
import { KeyedLock } from '../lib/lock';
import { createLogger } from '../lib/logger';
import { mapWithConcurrency } from '../lib/pool';
import { readYaml, writeYaml } from '../lib/yaml';
import { parseManifests, type ParseManifestsOptions } from './manifest-service';
import { readCharmMetadata } from './metadata-service';
import type { RepositoryClient, RepositoryClientFactory } from './repository-client';

const log = createLogger('registry');

export const CHANNEL_VARIABLE = 'channel';

export interface ManagedComponent {
  name: string;
  client: RepositoryClient;
  references: ComponentReference[];
  local?: LocalCharmMetadata;
}

// Components sharing one repository, in registry order
export interface RepositoryGroup {
  client: RepositoryClient;
  ref: string;
  components: ManagedComponent[];
}

function parseDumpedRepository(file: string | undefined, value: unknown, index: number): DumpedRepository {
  if (!isRecord(value)) {
    throw new ParseError(`repositories[${index}] is not a mapping`, file);
  }
  const url = readString(value, 'url');
  const branch = readString(value, 'branch');
  if (!url || !branch) {
    throw new ParseError(`repositories[${index}] needs "url" and "branch"`, file);
  }
  const charms = readArray(value, 'charms').map((charm, charmIndex) => {
    const name = isRecord(charm) ? readString(charm, 'name') : undefined;
    const path = isRecord(charm) ? readString(charm, 'path') : undefined;
    if (!name || path === undefined) {
      throw new ParseError(`repositories[${index}].charms[${charmIndex}] needs "name" and "path"`, file);
    }
    return { name, path };
  });
  return { url, branch, charms };
}

export function parseRegistryDump(value: unknown, file?: string): RegistryDump {
  if (!isRecord(value) || !Array.isArray(value.repositories)) {
    throw new ParseError('Registry dump must contain a "repositories" list', file);
  }
  return {
    repositories: value.repositories.map((entry, index) => parseDumpedRepository(file, entry, index)),
  };
}

export class ComponentRegistry {
  private readonly clientsByUrl = new Map<string, RepositoryClient>();
  private readonly refsByUrl = new Map<string, string>();
  private readonly components = new Map<string, ManagedComponent>();
  private readonly locks = new KeyedLock<RepositoryClient>();

  constructor(private readonly createClient: RepositoryClientFactory) {}

  static fromReferences(
    references: Iterable<ComponentReference>,
    createClient: RepositoryClientFactory
  ): ComponentRegistry {
    const registry = new ComponentRegistry(createClient);
    for (const reference of references) {
      registry.add(reference);
    }
    return registry;
  }

  static async fromManifests(
    files: readonly string[],
    createClient: RepositoryClientFactory,
    options: ParseManifestsOptions = {}
  ): Promise<ComponentRegistry> {
    const grouped = await parseManifests(files, options);
    return ComponentRegistry.fromReferences([...grouped.values()].flat(), createClient);
  }

  // Builds clients from a dump without touching any remote
  static fromDump(dump: RegistryDump, createClient: RepositoryClientFactory): ComponentRegistry {
    return ComponentRegistry.fromReferences(
      dump.repositories.flatMap((repository) =>
        repository.charms.map((charm) => ({
          name: charm.name,
          repositoryUrl: repository.url,
          ref: repository.branch,
          subpath: charm.path,
        }))
      ),
      createClient
    );
  }

  static async load(file: string, createClient: RepositoryClientFactory): Promise<ComponentRegistry> {
    const dump = parseRegistryDump(await readYaml(file), file);
    return ComponentRegistry.fromDump(dump, createClient);
  }

  get size(): number {
    return this.components.size;
  }

  add(reference: ComponentReference): ManagedComponent {
    const url = normalizeRepositoryUrl(reference.repositoryUrl);
    const knownRef = this.refsByUrl.get(url);
    if (knownRef !== undefined && knownRef !== reference.ref) {
      throw new ParseError(`${url} is referenced at both ${knownRef} and ${reference.ref}`);
    }

    let client = this.clientsByUrl.get(url);
    if (!client) {
      client = this.createClient(url);
      this.clientsByUrl.set(url, client);
      this.refsByUrl.set(url, reference.ref);
    }

    const normalized = { ...reference, repositoryUrl: url };
    const existing = this.components.get(reference.name);
    if (existing) {
      if (existing.client !== client) {
        throw new ParseError(
          `Application ${reference.name} is declared in ${existing.client.url} and ${url}`
        );
      }
      existing.references.push(normalized);
      return existing;
    }

    const component: ManagedComponent = { name: reference.name, client, references: [normalized] };
    this.components.set(reference.name, component);
    return component;
  }

  get(name: string): ManagedComponent | undefined {
    return this.components.get(name);
  }

  list(): ManagedComponent[] {
    return [...this.components.values()];
  }

  clients(): RepositoryClient[] {
    return [...this.clientsByUrl.values()];
  }

  // Accepts "owner/name" or a repository URL
  findClient(repository: string): RepositoryClient | undefined {
    const url = normalizeRepositoryUrl(repository);
    return this.clients().find((client) => client.fullName === repository || client.url === url);
  }

  // Runs task once no other exclusive task holds the client's checkout
  exclusive<T>(client: RepositoryClient, task: () => Promise<T>): Promise<T> {
    return this.locks.run(client, task);
  }

  groups(): RepositoryGroup[] {
    const groups = new Map<RepositoryClient, RepositoryGroup>();
    for (const component of this.components.values()) {
      const group = groups.get(component.client);
      if (group) {
        group.components.push(component);
      } else {
        groups.set(component.client, {
          client: component.client,
          ref: this.refsByUrl.get(component.client.url) ?? component.references[0].ref,
          components: [component],
        });
      }
    }
    return [...groups.values()];
  }

  describe(): ComponentInfo[] {
    return this.list().map((component) => ({
      name: component.name,
      repositoryUrl: component.client.url,
      references: component.references,
      local: component.local,
    }));
  }

  toDump(): RegistryDump {
    return {
      repositories: this.groups().map((group) => ({
        url: group.client.url,
        branch: group.ref,
        charms: group.components.flatMap((component) =>
          component.references.map((reference) => ({ name: component.name, path: reference.subpath }))
        ),
      })),
    };
  }

  async dump(file: string): Promise<void> {
    await writeYaml(file, this.toDump(), { sortKeys: true });
  }

  /**
   * Clones or refreshes every checkout and reads the charm metadata of each
   * component. Failing repositories are reported and leave their components
   * without local metadata.
   */
  async loadLocalMetadata(concurrency = 4): Promise<FailedOutcome[]> {
    const results = await mapWithConcurrency(this.groups(), concurrency, async (group) => {
      const { client } = group;
      try {
        await this.exclusive(client, async () => {
          await client.ensureLocalCheckout();
          for (const component of group.components) {
            component.local = await readLocalMetadata(client, component.references[0].subpath);
          }
        });
        return null;
      } catch (error) {
        log.error({ repository: client.fullName, error: getErrorMessage(error) }, 'Failed to read local metadata');
        const failure: FailedOutcome = {
          repository: client.fullName,
          status: 'failed',
          error: toOutcomeError(error),
        };
        return failure;
      }
    });
    return results.filter((result): result is FailedOutcome => result !== null);
  }
}

export async function readLocalMetadata(
  client: RepositoryClient,
  subpath: string
): Promise<LocalCharmMetadata> {
  const metadata = await readCharmMetadata(posix.dirname(subpath), client);

  let version: string | undefined;
  const variablesFile = posix.join(subpath, 'variables.tf');
  if (await client.hasFile(variablesFile)) {
    version = await getVariableDefault(variablesFile, await client.readFile(variablesFile), CHANNEL_VARIABLE);
  }

  return {
    checkoutPath: client.checkoutPath,
    metadataFile: metadata.file,
    charmName: metadata.name,
    images: metadata.images,
    version,
  };
}
