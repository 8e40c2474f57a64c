import type { FastifyPluginAsync } from 'fastify';
import type { ApiResponse, RegistryResponse } from '@charm-fleet/shared';
import { sendError, type RouteOptions } from './respond';

export const registryRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  // Components and the repositories they live in
  fastify.get<{
    Reply: ApiResponse<RegistryResponse>;
  }>('/registry', async (_request, reply) => {
    try {
      return reply.send({
        success: true,
        data: {
          repositories: context.registry.clients().length,
          components: context.registry.describe(),
        },
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });
};
