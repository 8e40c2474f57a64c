import { mkdir } from 'fs/promises';
import { buildServer } from './app';
import { loadConfig, type AppConfig } from './lib/config';
import { createLogger } from './lib/logger';
import { getRunsDir } from './lib/paths';
import { createContext, createGitClientFactory } from './services/context';
import { loadCredentials } from './services/credentials-service';
import { ComponentRegistry } from './services/registry-service';

const log = createLogger('server');

export async function startServer(config: AppConfig = loadConfig()): Promise<void> {
  // Ensure data directories exist
  await mkdir(getRunsDir(config.dataDir), { recursive: true });
  await mkdir(config.reposDir, { recursive: true });

  const credentials = await loadCredentials(config.credentialsPath);
  const registry = await ComponentRegistry.load(
    config.registryPath,
    createGitClientFactory(config, credentials)
  );
  log.info(
    { components: registry.size, repositories: registry.clients().length },
    'Registry loaded'
  );

  const fastify = await buildServer(createContext(config, registry));

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (error) {
    fastify.log.error(error);
    process.exit(1);
  }
}

