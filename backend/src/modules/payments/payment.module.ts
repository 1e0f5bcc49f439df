/**
 * backend/src/modules/payments/payment.module.ts
 *
 * WHY:
 * - Wires the webhook router on top of the memberships and placements services.
 *
 * RULES:
 * - No infra creation here (DI passes the gateway and repo in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Queue } from '../../shared/messaging/queue';

import type { MembershipService } from '../memberships';
import type { PlacementService } from '../placements';

import type { PaymentGateway } from './gateway/payment-gateway';
import type { PaymentRepo } from './dal/payment.repo';
import { PaymentWebhookService } from './payment-webhook.service';
import { PaymentController } from './payment.controller';
import { registerPaymentRoutes } from './payment.routes';

export type PaymentModule = ReturnType<typeof createPaymentModule>;

export function createPaymentModule(deps: {
  db: DbExecutor;
  logger: Logger;
  gateway: PaymentGateway;
  auditRepo: AuditRepo;
  queue: Queue;
  paymentRepo: PaymentRepo;
  membershipService: MembershipService;
  placementService: PlacementService;
}) {
  const webhookService = new PaymentWebhookService(deps);
  const controller = new PaymentController(webhookService);

  return {
    webhookService,
    registerRoutes(app: FastifyInstance) {
      registerPaymentRoutes(app, controller);
    },
  };
}
