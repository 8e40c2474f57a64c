import type { FastifyPluginAsync } from 'fastify';
import type {
  ApiResponse,
  ImagesResponse,
  RunAcceptedResponse,
  UpdateImagesRequest,
} from '@charm-fleet/shared';
import { compareImages, updateImageTags } from '../services/image-service';
import { acceptRun, sendBadRequest, sendError, type RouteOptions } from './respond';

export const imageRoutes: FastifyPluginAsync<RouteOptions> = async (fastify, { context }) => {
  // Declared image tags that lag behind the registry
  fastify.get<{
    Reply: ApiResponse<ImagesResponse>;
  }>('/images', async (_request, reply) => {
    try {
      const summary = await compareImages(context);
      return reply.send({ success: true, data: summary });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{
    Body: UpdateImagesRequest;
    Reply: ApiResponse<RunAcceptedResponse>;
  }>('/images/update', async (request, reply) => {
    if (!request.body?.branchName) {
      return sendBadRequest(reply, 'branchName is required');
    }
    if (!request.body.title) {
      return sendBadRequest(reply, 'title is required');
    }

    const body = request.body;
    await acceptRun(fastify.log, reply, async (onStart) => {
      const summary = await compareImages(context);
      return updateImageTags(context, { ...body, summary, onStart });
    });
    return reply;
  });
};
