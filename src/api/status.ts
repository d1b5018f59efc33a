import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { sendError } from './errors.js';
import type { RouteOptions } from './types.js';

const mutationsQuery = z.object({
  limit: z.coerce.number().int().positive().max(2000).default(100),
});

export async function statusRoutes(fastify: FastifyInstance, { service }: RouteOptions) {
  // GET /api/status - Reconciled view of every tracked key
  fastify.get('/status', async (request, reply) => {
    try {
      return service.status();
    } catch (error) {
      return sendError(reply, 'Failed to read status', error);
    }
  });

  // GET /api/progress - Current or last job
  fastify.get('/progress', async () => {
    return service.progress();
  });

  // GET /api/mutations?limit= - Favorite changes, newest first
  fastify.get('/mutations', async (request, reply) => {
    try {
      const { limit } = mutationsQuery.parse(request.query);
      return { mutations: service.mutationLog(limit) };
    } catch (error) {
      return sendError(reply, 'Failed to read mutations', error);
    }
  });

  // GET /api/session - Whether the saved remote session is still signed in
  fastify.get('/session', async (request, reply) => {
    try {
      return await service.checkSession();
    } catch (error) {
      return sendError(reply, 'Session check failed', error);
    }
  });

  // GET /api/settings
  fastify.get('/settings', async () => {
    return service.settings();
  });

  // PUT /api/settings - Partial update
  fastify.put('/settings', async (request, reply) => {
    try {
      return await service.updateSettings(request.body ?? {});
    } catch (error) {
      return sendError(reply, 'Failed to save settings', error);
    }
  });
}
