/**
 * backend/src/modules/memberships/membership.module.ts
 *
 * WHY:
 * - Encapsulates Memberships module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { Queue } from '../../shared/messaging/queue';

import type { UserRepo } from '../users';
import type { PaymentGateway, PaymentRepo } from '../payments';

import { MembershipRepo } from './dal/membership.repo';
import { MembershipService } from './membership.service';
import { MembershipController } from './membership.controller';
import { registerMembershipRoutes } from './membership.routes';

export type MembershipModule = ReturnType<typeof createMembershipModule>;

export function createMembershipModule(deps: {
  db: DbExecutor;
  logger: Logger;
  rateLimiter: RateLimiter;
  gateway: PaymentGateway;
  auditRepo: AuditRepo;
  queue: Queue;
  userRepo: UserRepo;
  paymentRepo: PaymentRepo;
  currency: string;
}) {
  const membershipRepo = new MembershipRepo(deps.db);

  const membershipService = new MembershipService({
    db: deps.db,
    logger: deps.logger,
    rateLimiter: deps.rateLimiter,
    gateway: deps.gateway,
    auditRepo: deps.auditRepo,
    queue: deps.queue,
    membershipRepo,
    userRepo: deps.userRepo,
    paymentRepo: deps.paymentRepo,
    currency: deps.currency,
  });

  const controller = new MembershipController(membershipService);

  return {
    membershipRepo,
    membershipService,
    registerRoutes(app: FastifyInstance) {
      registerMembershipRoutes(app, controller);
    },
  };
}
