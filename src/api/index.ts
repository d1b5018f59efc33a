import { FastifyInstance } from 'fastify';
import { capturesRoutes } from './captures.js';
import { statusRoutes } from './status.js';
import { syncRoutes } from './sync.js';
import { tracksRoutes } from './tracks.js';
import type { RouteOptions } from './types.js';

export async function registerRoutes(fastify: FastifyInstance, { service }: RouteOptions) {
  // Health check
  fastify.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Register all route modules
  await fastify.register(statusRoutes, { prefix: '/api', service });
  await fastify.register(syncRoutes, { prefix: '/api', service });
  await fastify.register(tracksRoutes, { prefix: '/api', service });
  await fastify.register(capturesRoutes, { prefix: '/api', service });
}
