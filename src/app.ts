import Fastify, {
  type FastifyBaseLogger,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import cors from '@fastify/cors';
import { registerRoutes } from './api/index.js';
import { logger, type SyncService } from '../services/cratesync/src/index.js';

export interface AppOptions {
  /** Defaults to the engine's logger so server and jobs share one output */
  logger?: FastifyBaseLogger;
}

/**
 * Fastify instance with CORS and every /api route bound to the given service
 */
export async function buildApp(service: SyncService, options: AppOptions = {}) {
  const app = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, FastifyBaseLogger>({
    loggerInstance: options.logger ?? logger,
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, { service });

  return app;
}
