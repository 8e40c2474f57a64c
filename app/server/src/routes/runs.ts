import type { FastifyPluginAsync } from 'fastify';
import type { ApiResponse, RunEventsResponse } from '@charm-fleet/shared';
import { sendError, type RouteOptions } from './respond';

export const runRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  // Journal of a batch run
  fastify.get<{
    Params: { runId: string };
    Reply: ApiResponse<RunEventsResponse>;
  }>('/runs/:runId/events', async (request, reply) => {
    try {
      const events = await context.recorder.events(request.params.runId);
      if (events.length === 0) {
        return reply.status(404).send({
          success: false,
          error: 'Run not found',
        });
      }
      return reply.send({ success: true, data: { events } });
    } catch (error) {
      return sendError(reply, error);
    }
  });
};
