import { ParseError } from './errors';

const HTTPS_URL_PATTERN = /^https?:\/\/github\.com\/([\w.-]+)\/([\w.-]+?)(?:\.git)?\/?$/;
const SSH_URL_PATTERN = /^git@github\.com:([\w.-]+)\/([\w.-]+?)(?:\.git)?$/;

export function normalizeRepositoryUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').replace(/\.git$/, '');
}

/**
 * Returns "owner/name" for a GitHub remote URL (https or ssh form).
 */
export function getRepositoryFullName(remoteUrl: string): string {
  const url = remoteUrl.trim();
  const match = HTTPS_URL_PATTERN.exec(url) ?? SSH_URL_PATTERN.exec(url);
  if (!match) {
    throw new ParseError(`Invalid remote repository url: ${remoteUrl}`);
  }
  return `${match[1]}/${match[2]}`;
}
