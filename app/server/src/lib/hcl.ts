import { parse } from '@cdktf/hcl2json';
import { ParseError, getErrorMessage } from './errors';
import { isRecord, readString } from './guards';

export type HclDocument = Record<string, unknown>;

export async function parseHcl(file: string, content: string): Promise<HclDocument> {
  let parsed: unknown;
  try {
    parsed = await parse(file, content);
  } catch (error) {
    throw new ParseError(`Malformed HCL: ${getErrorMessage(error)}`, file, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ParseError('HCL document is not a mapping', file);
  }
  return parsed;
}

// hcl2json renders every block body as a list of objects
export function blockBodies(value: unknown): Record<string, unknown>[] {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }
  return isRecord(value) ? [value] : [];
}

export function labelledBlocks(
  container: Record<string, unknown>,
  type: string
): Array<[string, Record<string, unknown>]> {
  const blocks = container[type];
  if (!isRecord(blocks)) {
    return [];
  }
  return Object.entries(blocks).flatMap(([label, value]) =>
    blockBodies(value).map((body): [string, Record<string, unknown>] => [label, body])
  );
}

export async function getVariableDefault(
  file: string,
  content: string,
  variable: string
): Promise<string | undefined> {
  const document = await parseHcl(file, content);
  for (const [label, body] of labelledBlocks(document, 'variable')) {
    if (label === variable) {
      return readString(body, 'default');
    }
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// In-place edits. Terraform files are rewritten textually so that comments and
// formatting outside the edited attribute survive.

interface Range {
  start: number;
  end: number;
}

interface Block {
  headerStart: number;
  open: number;
  close: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wholeDocument(content: string): Range {
  return { start: 0, end: content.length };
}

function bodyOf(block: Block): Range {
  return { start: block.open + 1, end: block.close };
}

function skipString(content: string, index: number): number {
  let i = index + 1;
  while (i < content.length) {
    const ch = content[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '"') return i + 1;
    i++;
  }
  return i;
}

function skipComment(content: string, index: number): number {
  if (content[index] === '#' || content.startsWith('//', index)) {
    const eol = content.indexOf('\n', index);
    return eol === -1 ? content.length : eol;
  }
  if (content.startsWith('/*', index)) {
    const close = content.indexOf('*/', index + 2);
    return close === -1 ? content.length : close + 2;
  }
  return index;
}

function findClosingBrace(content: string, open: number): number {
  let depth = 0;
  let i = open;
  while (i < content.length) {
    const ch = content[i];
    if (ch === '"') {
      i = skipString(content, i);
      continue;
    }
    const afterComment = skipComment(content, i);
    if (afterComment !== i) {
      i = afterComment;
      continue;
    }
    if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  throw new ParseError(`Unbalanced braces starting at offset ${open}`);
}

// Offsets at which a statement begins at the top level of the range
function statementStarts(content: string, range: Range): number[] {
  const starts: number[] = [];
  let depth = 0;
  let expectStatement = true;
  let i = range.start;

  while (i < range.end) {
    const ch = content[i];
    if (ch === '\n' || ch === ',') {
      if (depth === 0) expectStatement = true;
      i++;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++;
      continue;
    }
    if (expectStatement && depth === 0) {
      starts.push(i);
    }
    expectStatement = false;

    if (ch === '"') {
      i = skipString(content, i);
      continue;
    }
    const afterComment = skipComment(content, i);
    if (afterComment !== i) {
      i = afterComment;
      continue;
    }
    if (ch === '{' || ch === '[' || ch === '(') depth++;
    else if (ch === '}' || ch === ']' || ch === ')') depth--;
    i++;
  }

  return starts;
}

function findBlock(content: string, range: Range, header: RegExp): Block | null {
  const sticky = new RegExp(header.source, 'y');
  for (const start of statementStarts(content, range)) {
    sticky.lastIndex = start;
    const match = sticky.exec(content);
    if (match) {
      const open = start + match[0].length - 1;
      return { headerStart: start, open, close: findClosingBrace(content, open) };
    }
  }
  return null;
}

function findValueEnd(content: string, from: number, limit: number): number {
  let depth = 0;
  let i = from;
  while (i < limit) {
    const ch = content[i];
    if (depth === 0 && (ch === '\n' || ch === ',')) break;
    if (ch === '"') {
      i = skipString(content, i);
      continue;
    }
    if (skipComment(content, i) !== i) break;
    if (ch === '{' || ch === '[' || ch === '(') depth++;
    else if (ch === '}' || ch === ']' || ch === ')') depth--;
    i++;
  }
  let end = Math.min(i, limit);
  while (end > from && /\s/.test(content[end - 1])) end--;
  return end;
}

function insertAttribute(content: string, block: Block, name: string, rendered: string): string {
  const lineStart = content.lastIndexOf('\n', block.close - 1) + 1;
  const closingIndent = content.slice(lineStart, block.close);
  if (lineStart <= block.open || closingIndent.trim() !== '') {
    throw new ParseError(`Cannot add "${name}" to a single-line block`);
  }
  const line = `${closingIndent}  ${name} = ${rendered}\n`;
  return content.slice(0, lineStart) + line + content.slice(lineStart);
}

function setAttribute(content: string, block: Block, name: string, rendered: string): string {
  const range = bodyOf(block);
  const pattern = new RegExp(`${escapeRegExp(name)}\\s*=(?!=)`, 'y');

  for (const start of statementStarts(content, range)) {
    pattern.lastIndex = start;
    const match = pattern.exec(content);
    if (!match) continue;
    const valueStart = start + match[0].length;
    const valueEnd = findValueEnd(content, valueStart, range.end);
    return content.slice(0, valueStart) + ' ' + rendered + content.slice(valueEnd);
  }

  return insertAttribute(content, block, name, rendered);
}

const TERRAFORM_HEADER = /terraform\s*\{/;
const REQUIRED_PROVIDERS_HEADER = /required_providers\s*=?\s*\{/;

function variableHeader(name: string): RegExp {
  return new RegExp(`variable\\s+"${escapeRegExp(name)}"\\s*\\{`);
}

function providerHeader(name: string): RegExp {
  return new RegExp(`"?${escapeRegExp(name)}"?\\s*=\\s*\\{`);
}

// Offset of `<type> "<label>" {` at the top level, or -1
export function findBlockOffset(content: string, type: string, label: string): number {
  const header = new RegExp(`${escapeRegExp(type)}\\s+"${escapeRegExp(label)}"\\s*\\{`);
  return findBlock(content, wholeDocument(content), header)?.headerStart ?? -1;
}

/**
 * Sets `attribute` of `variable "<variable>"` to a string value, adding the
 * attribute when it is absent. Documents without the variable are returned as is.
 */
export function setVariableAttribute(
  content: string,
  variable: string,
  attribute: string,
  value: string
): string {
  const block = findBlock(content, wholeDocument(content), variableHeader(variable));
  if (!block) {
    return content;
  }
  return setAttribute(content, block, attribute, JSON.stringify(value));
}

export interface ProviderVersionUpdate {
  requiredVersion?: string;
  providers?: Record<string, string>;
}

/**
 * Rewrites `terraform.required_version` and the `version` of providers already
 * declared under `required_providers`. Undeclared providers are left out.
 */
export function setProviderVersions(content: string, update: ProviderVersionUpdate): string {
  let result = content;

  if (update.requiredVersion !== undefined) {
    const terraform = findBlock(result, wholeDocument(result), TERRAFORM_HEADER);
    if (!terraform) {
      return content;
    }
    result = setAttribute(result, terraform, 'required_version', JSON.stringify(update.requiredVersion));
  }

  for (const [provider, version] of Object.entries(update.providers ?? {})) {
    // offsets move after every edit, so blocks are located again each time
    const terraform = findBlock(result, wholeDocument(result), TERRAFORM_HEADER);
    if (!terraform) return result;
    const providers = findBlock(result, bodyOf(terraform), REQUIRED_PROVIDERS_HEADER);
    if (!providers) return result;
    const entry = findBlock(result, bodyOf(providers), providerHeader(provider));
    if (!entry) continue;
    result = setAttribute(result, entry, 'version', JSON.stringify(version));
  }

  return result;
}
