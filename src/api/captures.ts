import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { sendError } from './errors.js';
import type { RouteOptions } from './types.js';

const capturesBody = z.object({
  tracks: z.array(z.unknown()),
});

export async function capturesRoutes(fastify: FastifyInstance, { service }: RouteOptions) {
  // POST /api/captures - Merge identified tracks into the capture list
  fastify.post('/captures', async (request, reply) => {
    try {
      const { tracks } = capturesBody.parse(request.body);
      return await service.importCaptures(tracks);
    } catch (error) {
      return sendError(reply, 'Import failed', error);
    }
  });
}
