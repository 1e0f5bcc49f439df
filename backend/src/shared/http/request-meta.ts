/**
 * backend/src/shared/http/request-meta.ts
 *
 * WHY:
 * - Services need requestId/ip/userAgent for audit rows but must not import Fastify.
 * - Controllers build this once per request; jobs and webhooks pass what they have.
 */

import type { FastifyRequest } from 'fastify';

export type RequestMeta = {
  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export function requestMeta(req: FastifyRequest): RequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.ip,
    userAgent: req.headers['user-agent'] ?? null,
  };
}
