import { readFile, writeFile, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { parse, stringify } from 'yaml';
import { ParseError, getErrorMessage } from './errors';

export interface WriteYamlOptions {
  sortKeys?: boolean;
}

export function parseYaml(content: string, file?: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new ParseError(`Malformed YAML: ${getErrorMessage(error)}`, file, { cause: error });
  }
}

export async function readYaml(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, 'utf-8');
  return parseYaml(content, filePath);
}

export async function writeYaml<T>(
  filePath: string,
  data: T,
  options: WriteYamlOptions = {}
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, stringifyYaml(data, options), 'utf-8');
}

export function stringifyYaml<T>(data: T, options: WriteYamlOptions = {}): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 0,
    sortMapEntries: options.sortKeys ?? false,
  });
}
