import { homedir } from 'os';
import { join } from 'path';

export function getDefaultDataDir(): string {
  return join(homedir(), '.charm-fleet');
}

export function getRunsDir(dataDir: string): string {
  return join(dataDir, 'runs');
}

export function getRunDir(dataDir: string, runId: string): string {
  return join(getRunsDir(dataDir), runId);
}

export function getRunEventsPath(dataDir: string, runId: string): string {
  return join(getRunDir(dataDir, runId), 'events.jsonl');
}

// checkout of a repository: {reposDir}/{owner}/{repo name}/
export function getCheckoutDir(reposDir: string, repositoryFullName: string): string {
  return join(reposDir, ...repositoryFullName.split('/'));
}
