import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { sendError } from './errors.js';
import type { RouteOptions } from './types.js';

const keyBody = z.object({
  key: z.string().min(1),
});

const keysBody = z.object({
  keys: z.array(z.string().min(1)).min(1),
});

const downloadQuery = z.object({
  key: z.string().min(1),
  format: z.string().min(1).optional(),
});

export async function tracksRoutes(fastify: FastifyInstance, { service }: RouteOptions) {
  // POST /api/tracks/star - Star one track and clear its dismissal
  fastify.post('/tracks/star', async (request, reply) => {
    try {
      const { key } = keyBody.parse(request.body);
      const job = service.star(key);
      return reply.code(202).send({ started: job.name, key });
    } catch (error) {
      return sendError(reply, 'Star not started', error);
    }
  });

  // POST /api/tracks/unstar - Unstar one track and dismiss it
  fastify.post('/tracks/unstar', async (request, reply) => {
    try {
      const { key } = keyBody.parse(request.body);
      const job = service.unstar(key);
      return reply.code(202).send({ started: job.name, key });
    } catch (error) {
      return sendError(reply, 'Unstar not started', error);
    }
  });

  // POST /api/tracks/undismiss - Clear the dismissal and star it again
  fastify.post('/tracks/undismiss', async (request, reply) => {
    try {
      const { key } = keyBody.parse(request.body);
      const job = service.undismiss(key);
      return reply.code(202).send({ started: job.name, key });
    } catch (error) {
      return sendError(reply, 'Undismiss not started', error);
    }
  });

  // POST /api/tracks/skip - Hide from to_download without touching the remote
  fastify.post('/tracks/skip', async (request, reply) => {
    try {
      const { keys } = keysBody.parse(request.body);
      return { skipped: await service.skip(keys) };
    } catch (error) {
      return sendError(reply, 'Skip failed', error);
    }
  });

  fastify.post('/tracks/unskip', async (request, reply) => {
    try {
      const { keys } = keysBody.parse(request.body);
      return { unskipped: await service.unskip(keys) };
    } catch (error) {
      return sendError(reply, 'Unskip failed', error);
    }
  });

  // POST /api/tracks/cleanup-matches - Drop stored matches under the score threshold
  fastify.post('/tracks/cleanup-matches', async (request, reply) => {
    try {
      return await service.cleanupMatches();
    } catch (error) {
      return sendError(reply, 'Cleanup failed', error);
    }
  });

  fastify.post('/tracks/dismiss-manual-check', async (request, reply) => {
    try {
      const { key } = keyBody.parse(request.body);
      await service.dismissManualCheck(key);
      return { success: true, key };
    } catch (error) {
      return sendError(reply, 'Dismiss failed', error);
    }
  });

  // GET /api/tracks/download-link?key=&format=
  fastify.get('/tracks/download-link', async (request, reply) => {
    try {
      const { key, format } = downloadQuery.parse(request.query);
      return { key, url: await service.downloadLink(key, format) };
    } catch (error) {
      return sendError(reply, 'Download link unavailable', error);
    }
  });
}
