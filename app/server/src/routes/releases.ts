import type { FastifyPluginAsync } from 'fastify';
import type { ApiResponse, CutReleaseRequest, RunAcceptedResponse } from '@charm-fleet/shared';
import { cutRelease } from '../services/release-service';
import { acceptRun, sendBadRequest, type RouteOptions } from './respond';

export const releaseRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  // Cut a release across every repository of the registry
  fastify.post<{
    Body: CutReleaseRequest;
    Reply: ApiResponse<RunAcceptedResponse>;
  }>('/releases', async (request, reply) => {
    if (!request.body?.branchName) {
      return sendBadRequest(reply, 'branchName is required');
    }
    if (!request.body.title) {
      return sendBadRequest(reply, 'title is required');
    }

    const body = request.body;
    await acceptRun(fastify.log, reply, (onStart) => cutRelease(context, { ...body, onStart }));
    return reply;
  });
};
