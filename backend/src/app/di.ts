/**
 * backend/src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis, stripe) and shares them safely.
 * - Tests hand in in-process infra (pg-mem, InMemCache, InMemPaymentGateway).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (disable rate limits in test, pick the
 *   payment gateway) belong HERE, not inside the classes themselves (DIP).
 */

import Stripe from 'stripe';

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';
import { SessionStore } from '../shared/session/session.store';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import { PaymentRepo } from '../modules/payments';
import type { PaymentGateway } from '../modules/payments';
import { StripePaymentGateway } from '../modules/payments/gateway/stripe-payment-gateway';
import { InMemPaymentGateway } from '../modules/payments/gateway/inmem-payment-gateway';
import { createPaymentModule } from '../modules/payments/payment.module';
import type { PaymentModule } from '../modules/payments/payment.module';

import { UserRepo } from '../modules/users';

import { createMembershipModule } from '../modules/memberships/membership.module';
import type { MembershipModule } from '../modules/memberships/membership.module';

import { createPlacementModule } from '../modules/placements/placement.module';
import type { PlacementModule } from '../modules/placements/placement.module';

import { createVacancyModule } from '../modules/vacancies/vacancy.module';
import type { VacancyModule } from '../modules/vacancies/vacancy.module';

import { createAdminModule } from '../modules/admin/admin.module';
import type { AdminModule } from '../modules/admin/admin.module';

/**
 * Pre-built infra. Anything omitted is created from config.
 */
export type InfraOverrides = {
  db?: Db;
  cache?: Cache;
  paymentGateway?: PaymentGateway;
  queue?: Queue;
};

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;

  auditRepo: AuditRepo;
  sessionStore: SessionStore;

  paymentGateway: PaymentGateway;

  // messaging
  queue: Queue;

  // modules
  userRepo: UserRepo;
  memberships: MembershipModule;
  placements: PlacementModule;
  vacancies: VacancyModule;
  payments: PaymentModule;
  admin: AdminModule;

  // lifecycle
  close: () => Promise<void>;
};

function buildPaymentGateway(config: AppConfig): PaymentGateway {
  const { stripeSecretKey, webhookSecret } = config.payments;

  if (stripeSecretKey) {
    return new StripePaymentGateway(new Stripe(stripeSecretKey), webhookSecret);
  }

  logger.warn('payments.gateway.in_memory', {
    flow: 'di',
    env: config.nodeEnv,
    message: 'STRIPE_SECRET_KEY not set; using the in-memory payment gateway',
  });
  return new InMemPaymentGateway(webhookSecret);
}

export async function buildDeps(config: AppConfig, infra: InfraOverrides = {}): Promise<AppDeps> {
  const db =
    infra.db ??
    createDb({ databaseUrl: config.databaseUrl, applicationName: config.serviceName });

  // Redis is mandatory outside tests
  const cache = infra.cache ?? (await RedisCache.connect(config.redisUrl));

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // shared repos / stores
  const auditRepo = new AuditRepo(db);
  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);
  const paymentRepo = new PaymentRepo(db);

  const paymentGateway = infra.paymentGateway ?? buildPaymentGateway(config);

  // Phase 1: in-memory queue (swap for an SQS/SendGrid adapter here in production)
  const queue: Queue = infra.queue ?? new InMemQueue();

  const billing = {
    db,
    logger,
    rateLimiter,
    gateway: paymentGateway,
    auditRepo,
    queue,
    paymentRepo,
    currency: config.payments.currency,
  };

  // modules (no HTTP / no business logic here)
  const userRepo = new UserRepo(db);

  const memberships = createMembershipModule({ ...billing, userRepo });
  const placements = createPlacementModule(billing);

  const vacancies = createVacancyModule({
    db,
    logger,
    auditRepo,
    placementService: placements.placementService,
  });

  const payments = createPaymentModule({
    db,
    logger,
    gateway: paymentGateway,
    auditRepo,
    queue,
    paymentRepo,
    membershipService: memberships.membershipService,
    placementService: placements.placementService,
  });

  const admin = createAdminModule({
    db,
    logger,
    auditRepo,
    userRepo,
    membershipService: memberships.membershipService,
    placementService: placements.placementService,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    auditRepo,
    sessionStore,
    paymentGateway,
    queue,
    userRepo,
    memberships,
    placements,
    vacancies,
    payments,
    admin,
    close: async () => {
      await cache.close();
      await db.destroy();
    },
  };
}
