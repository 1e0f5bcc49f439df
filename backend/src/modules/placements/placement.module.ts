/**
 * backend/src/modules/placements/placement.module.ts
 *
 * WHY:
 * - Encapsulates Placements module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Queue } from '../../shared/messaging/queue';

import type { PaymentGateway, PaymentRepo } from '../payments';

import { PlacementRepo } from './dal/placement.repo';
import { PlacementService } from './placement.service';
import { PlacementController } from './placement.controller';
import { registerPlacementRoutes } from './placement.routes';

export type PlacementModule = ReturnType<typeof createPlacementModule>;

export function createPlacementModule(deps: {
  db: DbExecutor;
  logger: Logger;
  rateLimiter: RateLimiter;
  gateway: PaymentGateway;
  auditRepo: AuditRepo;
  queue: Queue;
  paymentRepo: PaymentRepo;
  currency: string;
}) {
  const placementRepo = new PlacementRepo(deps.db);

  const placementService = new PlacementService({
    db: deps.db,
    logger: deps.logger,
    rateLimiter: deps.rateLimiter,
    gateway: deps.gateway,
    auditRepo: deps.auditRepo,
    queue: deps.queue,
    placementRepo,
    paymentRepo: deps.paymentRepo,
    currency: deps.currency,
  });

  const controller = new PlacementController(placementService);

  return {
    placementService,
    registerRoutes(app: FastifyInstance) {
      registerPlacementRoutes(app, controller);
    },
  };
}
