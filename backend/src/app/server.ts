/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest):
 * 1. request context (requestId)
 * 2. auth context stub (all null)
 * 3. session middleware (fills auth context from the `sid` cookie)
 * 4. request logging
 *
 * onResponse logs status and latency once the reply is sent.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { withRequestContext } from '../shared/logger/with-context';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, opts.deps.sessionStore);
  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    withRequestContext(req).info('http.request', {
      flow: 'http',
      method: req.method,
      url: req.url,
    });
  });

  app.addHook('onResponse', async (req, reply) => {
    withRequestContext(req).info('http.response', {
      flow: 'http',
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
      durationMs: Math.round(reply.elapsedTime),
    });
  });

  return app;
}
