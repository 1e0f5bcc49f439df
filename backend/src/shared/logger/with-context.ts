/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Most logs should include requestId + userId so a payment can be traced
 *   from the HTTP call to the audit row.
 *
 * HOW TO USE:
 * - In a request handler: `withRequestContext(req).info('msg', { flow: '...' })`
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';
import type { Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  return logger.child({
    requestId: req.requestContext?.requestId,
    userId: req.authContext?.userId ?? null,
    role: req.authContext?.role ?? null,
  });
}
