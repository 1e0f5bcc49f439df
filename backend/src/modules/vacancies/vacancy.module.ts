/**
 * backend/src/modules/vacancies/vacancy.module.ts
 *
 * WHY:
 * - Encapsulates Vacancies module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { PlacementService } from '../placements';

import { VacancyRepo } from './dal/vacancy.repo';
import { VacancyService } from './vacancy.service';
import { VacancyController } from './vacancy.controller';
import { registerVacancyRoutes } from './vacancy.routes';

export type VacancyModule = ReturnType<typeof createVacancyModule>;

export function createVacancyModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  placementService: PlacementService;
}) {
  const vacancyRepo = new VacancyRepo(deps.db);

  const vacancyService = new VacancyService({
    db: deps.db,
    logger: deps.logger,
    auditRepo: deps.auditRepo,
    vacancyRepo,
    placementService: deps.placementService,
  });

  const controller = new VacancyController(vacancyService);

  return {
    vacancyService,
    registerRoutes(app: FastifyInstance) {
      registerVacancyRoutes(app, controller);
    },
  };
}
