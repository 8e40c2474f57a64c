import { join } from 'path';
import { ConfigError } from './errors';
import { getDefaultDataDir } from './paths';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry';

export interface AppConfig {
  dataDir: string;
  reposDir: string;
  credentialsPath: string;
  registryPath: string;
  defaultBranch: string;
  concurrency: number;
  retry: RetryPolicy;
  exclude: string[];
  port: number;
  host: string;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number
): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readList(env: NodeJS.ProcessEnv, name: string): string[] {
  return (env[name] || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = env.FLEET_DATA_DIR || getDefaultDataDir();

  return {
    dataDir,
    reposDir: env.FLEET_REPOS_DIR || join(dataDir, 'repos'),
    credentialsPath: env.FLEET_CREDENTIALS || join(dataDir, 'credentials.json'),
    registryPath: env.FLEET_REGISTRY || join(dataDir, 'registry.yaml'),
    defaultBranch: env.FLEET_DEFAULT_BRANCH || 'main',
    concurrency: readInteger(env, 'FLEET_CONCURRENCY', 4, 1),
    retry: {
      maxAttempts: readInteger(env, 'FLEET_RETRY_MAX_ATTEMPTS', DEFAULT_RETRY_POLICY.maxAttempts, 1),
      baseDelayMs: readInteger(env, 'FLEET_RETRY_BASE_DELAY_MS', DEFAULT_RETRY_POLICY.baseDelayMs, 0),
      maxDelayMs: readInteger(env, 'FLEET_RETRY_MAX_DELAY_MS', DEFAULT_RETRY_POLICY.maxDelayMs, 0),
    },
    exclude: readList(env, 'FLEET_EXCLUDE'),
    port: readInteger(env, 'PORT', 3001, 0),
    host: env.HOST || '0.0.0.0',
  };
}
