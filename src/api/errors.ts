import type { FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import {
  BusyError,
  NotFoundError,
  PremiumRequiredError,
  SessionExpiredError,
  SyncError,
  errorMessage,
} from '../../services/cratesync/src/index.js';

export function statusFor(error: unknown): number {
  if (error instanceof ZodError) return 400;
  if (error instanceof BusyError) return 409;
  if (error instanceof SessionExpiredError) return 401;
  if (error instanceof PremiumRequiredError) return 402;
  if (error instanceof NotFoundError) return 404;
  return 500;
}

/**
 * Answer with { error, message } and the status matching the error kind
 */
export function sendError(reply: FastifyReply, label: string, error: unknown) {
  const status = statusFor(error);
  if (status >= 500) {
    reply.log.error({ err: error }, label);
  }
  return reply.code(status).send({
    error: label,
    message: errorMessage(error),
    ...(error instanceof SyncError ? { code: error.code } : {}),
    ...(error instanceof ZodError ? { issues: error.issues } : {}),
  });
}
