import type { GitCredentials } from '@charm-fleet/shared';
import type { AppConfig } from '../lib/config';
import { getRepositoryFullName } from '../lib/github';
import { getCheckoutDir } from '../lib/paths';
import { DockerHubClient, type ContainerRegistryClient } from './container-registry';
import { GitRepositoryClient } from './git-repository-client';
import type { ComponentRegistry } from './registry-service';
import type { RepositoryClientFactory } from './repository-client';
import { RunRecorder } from './run-recorder';

// Everything an orchestrator operation needs; operations hold no other state
export interface OrchestratorContext {
  registry: ComponentRegistry;
  recorder: RunRecorder;
  containerRegistry: ContainerRegistryClient;
  concurrency: number;
  defaultBranch: string;
}

export function createGitClientFactory(
  config: AppConfig,
  credentials: GitCredentials
): RepositoryClientFactory {
  return (url) =>
    new GitRepositoryClient({
      url,
      checkoutPath: getCheckoutDir(config.reposDir, getRepositoryFullName(url)),
      credentials,
      retry: config.retry,
    });
}

export function createContext(config: AppConfig, registry: ComponentRegistry): OrchestratorContext {
  return {
    registry,
    recorder: new RunRecorder(config.dataDir),
    containerRegistry: new DockerHubClient({ retry: config.retry }),
    concurrency: config.concurrency,
    defaultBranch: config.defaultBranch,
  };
}
