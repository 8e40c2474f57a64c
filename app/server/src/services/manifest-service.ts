import { readFile } from 'fs/promises';
import type { ComponentReference } from '@charm-fleet/shared';
import { ParseError } from '../lib/errors';
import { blockBodies, findBlockOffset, labelledBlocks, parseHcl } from '../lib/hcl';
import { readString } from '../lib/guards';
import { normalizeRepositoryUrl } from '../lib/github';

// git::https://github.com/owner/repo//charms/foo/terraform?ref=track/3.4
const REMOTE_SOURCE_PATTERN =
  /^(?:[\w+-]+::)?(https?:\/\/[^?]+?)(?:\/\/([\w./-]*))?\?ref=([\w./-]+)$/;

export interface ParseManifestsOptions {
  exclude?: readonly string[];
  renames?: Readonly<Record<string, string>>;
}

export function parseModuleSource(
  name: string,
  source: string,
  file?: string
): ComponentReference | null {
  // local paths and registry modules are not managed repositories
  if (!source.includes('://')) {
    return null;
  }
  const match = REMOTE_SOURCE_PATTERN.exec(source.trim());
  if (!match) {
    throw new ParseError(`Module "${name}" has an unsupported source "${source}"`, file);
  }
  const [, url, subpath, ref] = match;
  if (!subpath) {
    throw new ParseError(`Module "${name}" source has no subpath: "${source}"`, file);
  }
  return {
    name,
    repositoryUrl: normalizeRepositoryUrl(url),
    ref,
    subpath,
  };
}

// hcl2json sorts block labels; references follow the order of the file instead
export function extractReferences(
  file: string,
  document: Record<string, unknown>,
  content: string
): ComponentReference[] {
  const modules = labelledBlocks(document, 'module')
    .map(([name, body]) => ({ name, body, offset: findBlockOffset(content, 'module', name) }))
    .sort((a, b) => a.offset - b.offset);

  const references: ComponentReference[] = [];
  for (const { name, body } of modules) {
    const source = readString(body, 'source');
    if (source === undefined) {
      throw new ParseError(`Module "${name}" has no source`, file);
    }
    const reference = parseModuleSource(name, source, file);
    if (reference) {
      references.push(reference);
    }
  }
  return references;
}

/**
 * Reads a Terraform module file and returns one reference per remote module,
 * in file order.
 */
export async function parseModule(file: string): Promise<ComponentReference[]> {
  const content = await readFile(file, 'utf-8');
  return extractReferences(file, await parseHcl(file, content), content);
}

/**
 * Parses several manifests and groups the references by application name.
 * Map iteration follows first appearance across the files.
 */
export async function parseManifests(
  files: readonly string[],
  options: ParseManifestsOptions = {}
): Promise<Map<string, ComponentReference[]>> {
  const excluded = new Set((options.exclude ?? []).map(normalizeRepositoryUrl));
  const renames = options.renames ?? {};
  const grouped = new Map<string, ComponentReference[]>();

  for (const file of files) {
    for (const reference of await parseModule(file)) {
      if (excluded.has(reference.repositoryUrl)) {
        continue;
      }
      const name = renames[reference.name] ?? reference.name;
      const entries = grouped.get(name) ?? [];
      entries.push({ ...reference, name });
      grouped.set(name, entries);
    }
  }

  return grouped;
}

// Charm names deployed by the `juju_application` resources of a module
export async function getApplicationNames(file: string): Promise<string[]> {
  const content = await readFile(file, 'utf-8');
  const document = await parseHcl(file, content);
  const names: string[] = [];

  for (const resources of blockBodies(document.resource)) {
    for (const [, application] of labelledBlocks(resources, 'juju_application')) {
      for (const charm of blockBodies(application.charm)) {
        const name = readString(charm, 'name');
        if (name) {
          names.push(name);
        }
      }
    }
  }

  return names;
}
