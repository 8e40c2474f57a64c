import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import cors from '@fastify/cors';
import websocket from '@fastify/websocket';
import { logger } from './lib/logger';
import type { OrchestratorContext } from './services/context';
import type { EventBus } from './services/event-bus';
import { imageRoutes } from './routes/images';
import { pullRoutes } from './routes/pulls';
import { registryRoutes } from './routes/registry';
import { releaseRoutes } from './routes/releases';
import { runRoutes } from './routes/runs';
import { wsRoutes } from './routes/ws';

export interface BuildServerOptions {
  bus?: EventBus;
}

export async function buildServer(
  context: OrchestratorContext,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, FastifyBaseLogger>({
    logger,
  });

  // Register plugins
  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  await fastify.register(websocket);

  // Register routes
  await fastify.register(registryRoutes, { prefix: '/api', context });
  await fastify.register(releaseRoutes, { prefix: '/api', context });
  await fastify.register(pullRoutes, { prefix: '/api', context });
  await fastify.register(imageRoutes, { prefix: '/api', context });
  await fastify.register(runRoutes, { prefix: '/api', context });
  await fastify.register(wsRoutes, { bus: options.bus });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  return fastify;
}
