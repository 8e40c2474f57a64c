import { readFile } from 'fs/promises';
import type { GitCredentials } from '@charm-fleet/shared';
import { ConfigError, getErrorMessage } from '../lib/errors';
import { isRecord, readString } from '../lib/guards';

export function parseCredentials(content: string, source = 'credentials'): GitCredentials {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${getErrorMessage(error)}`);
  }
  const username = isRecord(parsed) ? readString(parsed, 'username') : undefined;
  const token = isRecord(parsed) ? readString(parsed, 'access_token') : undefined;
  if (!username || !token) {
    throw new ConfigError(`${source} must define "username" and "access_token"`);
  }
  return Object.freeze({ username, token });
}

// Reads `{ "username": ..., "access_token": ... }`
export async function loadCredentials(path: string): Promise<GitCredentials> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read credentials file ${path}: ${getErrorMessage(error)}`);
  }
  return parseCredentials(content, path);
}
