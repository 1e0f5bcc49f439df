/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (memberships, payments, placements, vacancies, admin)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { pingDb } from '../shared/db/db';

type CheckStatus = 'up' | 'down';

function status(up: boolean): CheckStatus {
  return up ? 'up' : 'down';
}

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Platform readiness probe: 503 when Postgres or Redis is unreachable.
  app.get('/health', { config: { sessionless: true } }, async (req, reply) => {
    const [dbUp, cacheUp] = await Promise.all([pingDb(opts.deps.db), opts.deps.cache.ping()]);
    const ok = dbUp && cacheUp;

    return reply.status(ok ? 200 : 503).send({
      ok,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
      checks: { db: status(dbUp), cache: status(cacheUp) },
    });
  });

  // Module routes
  opts.deps.memberships.registerRoutes(app);
  opts.deps.payments.registerRoutes(app);
  opts.deps.placements.registerRoutes(app);
  opts.deps.vacancies.registerRoutes(app);
  opts.deps.admin.registerRoutes(app);
}
