import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { posix } from 'path';
import { parseDocument } from 'yaml';
import type { CharmMetadata, MetadataSource } from '@charm-fleet/shared';
import { ParseError } from '../lib/errors';
import { isRecord, readString } from '../lib/guards';
import { parseYaml } from '../lib/yaml';

const METADATA_FILES: readonly MetadataSource[] = ['metadata.yaml', 'charmcraft.yaml'];

function parseMapping(file: string, content: string): Record<string, unknown> {
  const parsed = parseYaml(content, file);
  if (parsed === null || parsed === undefined || parsed === '') {
    throw new ParseError('Metadata file is empty', file);
  }
  if (!isRecord(parsed)) {
    throw new ParseError('Metadata file does not contain a mapping at the root', file);
  }
  return parsed;
}

function readImages(document: Record<string, unknown>): Record<string, string> {
  const images: Record<string, string> = {};
  const resources = document.resources;
  if (!isRecord(resources)) {
    return images;
  }
  for (const [resource, definition] of Object.entries(resources)) {
    if (!isRecord(definition) || definition.type !== 'oci-image') continue;
    const upstream = readString(definition, 'upstream-source');
    if (upstream) {
      images[resource] = upstream;
    }
  }
  return images;
}

function readDocs(file: string, document: Record<string, unknown>, source: MetadataSource): string | undefined {
  if (source === 'metadata.yaml') {
    if (!('docs' in document)) return undefined;
    const docs = document.docs;
    if (typeof docs !== 'string') {
      throw new ParseError(`Invalid value for docs: expected a string`, file);
    }
    return docs;
  }

  const links = document.links;
  if (links === undefined || links === null) return undefined;
  if (!isRecord(links)) {
    throw new ParseError('Invalid value for links: expected a mapping', file);
  }
  const docs = links.documentation;
  if (docs !== undefined && docs !== null && typeof docs !== 'string') {
    throw new ParseError('Invalid value for documentation: expected a string', file);
  }
  return typeof docs === 'string' ? docs : undefined;
}

export function parseCharmMetadata(file: string, content: string, source: MetadataSource): CharmMetadata {
  const document = parseMapping(file, content);
  if (!('name' in document)) {
    throw new ParseError('Missing required key: name', file);
  }
  const name = document.name;
  if (typeof name !== 'string') {
    throw new ParseError('Invalid value for name: expected a string', file);
  }
  return {
    file,
    name,
    docs: readDocs(file, document, source),
    images: readImages(document),
    source,
  };
}

export interface MetadataReader {
  hasFile(path: string): Promise<boolean>;
  readFile(path: string): Promise<string>;
}

const fileSystemReader: MetadataReader = {
  hasFile: async (path) => existsSync(path),
  readFile: (path) => readFile(path, 'utf-8'),
};

/**
 * Reads the metadata of the charm in `charmDir`. metadata.yaml takes precedence
 * over charmcraft.yaml when both exist.
 */
export async function readCharmMetadata(
  charmDir: string,
  reader: MetadataReader = fileSystemReader
): Promise<CharmMetadata> {
  for (const source of METADATA_FILES) {
    const file = charmDir ? posix.join(charmDir, source) : source;
    if (await reader.hasFile(file)) {
      return parseCharmMetadata(file, await reader.readFile(file), source);
    }
  }
  throw new ParseError(`Could not find ${METADATA_FILES.join(' or ')} in ${charmDir || '.'}`);
}

// Rewrites resources.<resource>.upstream-source keeping the rest of the document
export function setImageSource(content: string, resource: string, image: string): string {
  const document = parseDocument(content);
  if (!document.hasIn(['resources', resource])) {
    throw new ParseError(`Resource "${resource}" is not declared`);
  }
  document.setIn(['resources', resource, 'upstream-source'], image);
  return document.toString({ lineWidth: 0 });
}
