import type { FastifyPluginAsync } from 'fastify';
import type {
  ApiResponse,
  MergePullRequestsRequest,
  PullRequestsResponse,
  RunAcceptedResponse,
} from '@charm-fleet/shared';
import { mergePullRequests, summarizePullRequests } from '../services/pull-request-service';
import { acceptRun, sendError, type RouteOptions } from './respond';

export const pullRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  // Pull requests opened from a branch
  fastify.get<{
    Params: { branch: string };
    Reply: ApiResponse<PullRequestsResponse>;
  }>('/pulls/:branch', async (request, reply) => {
    try {
      const report = await summarizePullRequests(context, request.params.branch);
      return reply.send({
        success: true,
        data: {
          pullRequests: [...report.pullRequests],
          failures: [...report.failures],
        },
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // Merge the pull requests that are ready (all open ones with force)
  fastify.post<{
    Params: { branch: string };
    Body: MergePullRequestsRequest | undefined;
    Reply: ApiResponse<RunAcceptedResponse>;
  }>('/pulls/:branch/merge', async (request, reply) => {
    const { branch } = request.params;
    const force = request.body?.force === true;
    await acceptRun(fastify.log, reply, async (onStart) => {
      const report = await summarizePullRequests(context, branch);
      return mergePullRequests(context, report, { force, onStart });
    });
    return reply;
  });
};
