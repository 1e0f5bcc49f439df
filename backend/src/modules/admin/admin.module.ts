/**
 * backend/src/modules/admin/admin.module.ts
 *
 * WHY:
 * - Encapsulates Admin module wiring on top of the billing services.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';

import type { UserRepo } from '../users';
import type { MembershipService } from '../memberships';
import type { PlacementService } from '../placements';

import { AdminService } from './admin.service';
import { AdminController } from './admin.controller';
import { registerAdminRoutes } from './admin.routes';

export type AdminModule = ReturnType<typeof createAdminModule>;

export function createAdminModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  userRepo: UserRepo;
  membershipService: MembershipService;
  placementService: PlacementService;
}) {
  const adminService = new AdminService({
    db: deps.db,
    logger: deps.logger,
    auditRepo: deps.auditRepo,
    userRepo: deps.userRepo,
  });

  const controller = new AdminController(
    adminService,
    deps.placementService,
    deps.membershipService,
  );

  return {
    adminService,
    registerRoutes(app: FastifyInstance) {
      registerAdminRoutes(app, controller);
    },
  };
}
