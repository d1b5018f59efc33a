import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { sendError } from './errors.js';
import type { RouteOptions } from './types.js';

const crawlBody = z.object({
  timeRange: z.enum(['1_month', '2_months', '3_months', 'all']).default('all'),
});

const searchBody = z
  .object({
    key: z.string().min(1).optional(),
    mode: z.enum(['unfound', 'retry_not_found']).default('unfound'),
  })
  .strict();

const syncBody = z.object({
  keys: z.array(z.string().min(1)).optional(),
});

export async function syncRoutes(fastify: FastifyInstance, { service }: RouteOptions) {
  // POST /api/crawl - Read the remote favorites listing
  fastify.post('/crawl', async (request, reply) => {
    try {
      const { timeRange } = crawlBody.parse(request.body ?? {});
      const job = service.crawl(timeRange);
      return reply.code(202).send({ started: job.name, timeRange });
    } catch (error) {
      return sendError(reply, 'Crawl not started', error);
    }
  });

  // POST /api/search - One key, or every track in a mode
  fastify.post('/search', async (request, reply) => {
    try {
      const { key, mode } = searchBody.parse(request.body ?? {});
      const job = service.search(key !== undefined ? { key } : { all: true, mode });
      return reply.code(202).send({ started: job.name });
    } catch (error) {
      return sendError(reply, 'Search not started', error);
    }
  });

  // POST /api/sync - Star pending tracks (all, or the given keys)
  fastify.post('/sync', async (request, reply) => {
    try {
      const { keys } = syncBody.parse(request.body ?? {});
      const job = service.sync(keys);
      return reply.code(202).send({ started: job.name });
    } catch (error) {
      return sendError(reply, 'Sync not started', error);
    }
  });

  // POST /api/rescan - Re-read captures and local folders
  fastify.post('/rescan', async (request, reply) => {
    try {
      const job = service.rescan();
      return reply.code(202).send({ started: job.name });
    } catch (error) {
      return sendError(reply, 'Rescan not started', error);
    }
  });

  // POST /api/stop - Stop the running job after its current track
  fastify.post('/stop', async () => {
    return { stopping: service.stop() };
  });

  // POST /api/not-found/reset
  fastify.post('/not-found/reset', async (request, reply) => {
    try {
      return { cleared: await service.resetNotFound() };
    } catch (error) {
      return sendError(reply, 'Reset failed', error);
    }
  });
}
