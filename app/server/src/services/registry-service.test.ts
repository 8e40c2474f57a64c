import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ComponentReference } from '@charm-fleet/shared';
import { LocalCheckoutError, ParseError } from '../lib/errors';
import { InMemoryRepositoryClient } from '../testing/in-memory-repository-client';
import { ComponentRegistry, parseRegistryDump } from './registry-service';
import type { RepositoryClientFactory } from './repository-client';

const ARGO = 'https://github.com/example/argo-operators';
const DEX = 'https://github.com/example/dex-auth-operator';

const REFERENCES: ComponentReference[] = [
  { name: 'argo_controller', repositoryUrl: ARGO, ref: 'track/3.4', subpath: 'charms/argo-controller/terraform' },
  { name: 'dex_auth', repositoryUrl: `${DEX}.git`, ref: 'track/2.39', subpath: 'terraform' },
  { name: 'argo_server', repositoryUrl: ARGO, ref: 'track/3.4', subpath: 'charms/argo-server/terraform' },
];

function factory(clients: Record<string, InMemoryRepositoryClient> = {}): RepositoryClientFactory {
  return (url) => clients[url] ?? new InMemoryRepositoryClient(url);
}

describe('ComponentRegistry', () => {
  describe('fromReferences', () => {
    it('should create one client per repository', () => {
      const registry = ComponentRegistry.fromReferences(REFERENCES, factory());

      expect(registry.size).toBe(3);
      expect(registry.clients().map((client) => client.fullName)).toEqual([
        'example/argo-operators',
        'example/dex-auth-operator',
      ]);
      expect(registry.get('argo_controller')?.client).toBe(registry.get('argo_server')?.client);
    });

    it('should group components by repository in registry order', () => {
      const registry = ComponentRegistry.fromReferences(REFERENCES, factory());
      const groups = registry.groups();

      expect(groups.map((group) => [group.ref, group.components.map((c) => c.name)])).toEqual([
        ['track/3.4', ['argo_controller', 'argo_server']],
        ['track/2.39', ['dex_auth']],
      ]);
    });

    it('should reject a repository referenced at two refs', () => {
      expect(() =>
        ComponentRegistry.fromReferences(
          [REFERENCES[0], { ...REFERENCES[2], ref: 'track/3.5' }],
          factory()
        )
      ).toThrow(`${ARGO} is referenced at both track/3.4 and track/3.5`);
    });

    it('should reject an application declared in two repositories', () => {
      expect(() =>
        ComponentRegistry.fromReferences(
          [REFERENCES[0], { ...REFERENCES[1], name: 'argo_controller' }],
          factory()
        )
      ).toThrow(ParseError);
    });

    it('should append further references of the same application', () => {
      const registry = ComponentRegistry.fromReferences(
        [REFERENCES[0], { ...REFERENCES[0], subpath: 'charms/argo-controller/terraform-v2' }],
        factory()
      );
      expect(registry.size).toBe(1);
      expect(registry.get('argo_controller')?.references).toHaveLength(2);
    });
  });

  describe('findClient', () => {
    it('should find clients by full name or URL', () => {
      const registry = ComponentRegistry.fromReferences(REFERENCES, factory());
      expect(registry.findClient('example/dex-auth-operator')?.url).toBe(DEX);
      expect(registry.findClient(`${ARGO}/`)?.fullName).toBe('example/argo-operators');
      expect(registry.findClient('example/unknown')).toBeUndefined();
    });
  });

  describe('dump and load', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'charm-fleet-registry-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should describe repositories with their charms', () => {
      const registry = ComponentRegistry.fromReferences(REFERENCES, factory());
      expect(registry.toDump()).toEqual({
        repositories: [
          {
            url: ARGO,
            branch: 'track/3.4',
            charms: [
              { name: 'argo_controller', path: 'charms/argo-controller/terraform' },
              { name: 'argo_server', path: 'charms/argo-server/terraform' },
            ],
          },
          { url: DEX, branch: 'track/2.39', charms: [{ name: 'dex_auth', path: 'terraform' }] },
        ],
      });
    });

    it('should load an equivalent registry from its dump', async () => {
      const file = join(dir, 'registry.yaml');
      const original = ComponentRegistry.fromReferences(REFERENCES, factory());
      await original.dump(file);

      const loaded = await ComponentRegistry.load(file, factory());

      expect(loaded.toDump()).toEqual(original.toDump());
      expect(loaded.list().map((component) => component.name)).toEqual([
        'argo_controller',
        'argo_server',
        'dex_auth',
      ]);
      const content = await readFile(file, 'utf-8');
      expect(content.startsWith('repositories:\n  - branch: track/3.4\n')).toBe(true);
    });

    it('should reject malformed dumps', () => {
      expect(() => parseRegistryDump({ repos: [] })).toThrow(
        'Registry dump must contain a "repositories" list'
      );
      expect(() => parseRegistryDump({ repositories: [{ url: ARGO }] })).toThrow(
        'repositories[0] needs "url" and "branch"'
      );
      expect(() =>
        parseRegistryDump({ repositories: [{ url: ARGO, branch: 'main', charms: [{ name: 'x' }] }] })
      ).toThrow('repositories[0].charms[0] needs "name" and "path"');
    });
  });

  describe('loadLocalMetadata', () => {
    it('should read charm metadata and channel of every component', async () => {
      const argo = new InMemoryRepositoryClient(ARGO, {
        files: {
          'charms/argo-controller/metadata.yaml':
            'name: argo-controller\nresources:\n  oci-image:\n    type: oci-image\n    upstream-source: example/argo:v3.4.16\n',
          'charms/argo-controller/terraform/variables.tf':
            'variable "channel" {\n  type    = string\n  default = "3.4/edge"\n}\n',
          'charms/argo-server/charmcraft.yaml': 'name: argo-server\n',
        },
      });
      const dex = new InMemoryRepositoryClient(DEX).failOn(
        'ensureLocalCheckout',
        new LocalCheckoutError('clone failed')
      );
      const registry = ComponentRegistry.fromReferences(REFERENCES, factory({ [ARGO]: argo, [DEX]: dex }));

      const failures = await registry.loadLocalMetadata();

      expect(failures).toEqual([
        {
          repository: 'example/dex-auth-operator',
          status: 'failed',
          error: { name: 'LocalCheckoutError', message: 'clone failed' },
        },
      ]);
      expect(registry.get('argo_controller')?.local).toEqual({
        checkoutPath: '/checkouts/argo-operators',
        metadataFile: 'charms/argo-controller/metadata.yaml',
        charmName: 'argo-controller',
        images: { 'oci-image': 'example/argo:v3.4.16' },
        version: '3.4/edge',
      });
      expect(registry.get('argo_server')?.local?.version).toBeUndefined();
      expect(registry.get('dex_auth')?.local).toBeUndefined();
      expect(argo.checkouts).toBe(1);
    });
  });
});
