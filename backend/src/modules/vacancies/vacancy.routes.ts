/**
 * backend/src/modules/vacancies/vacancy.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - Static paths (/eligibility, /mine) are declared before /:vacancyId for readability;
 *   Fastify's router prefers static segments either way.
 */

import type { FastifyInstance } from 'fastify';
import type { VacancyController } from './vacancy.controller';

export function registerVacancyRoutes(app: FastifyInstance, controller: VacancyController) {
  app.get('/vacancies/eligibility', controller.eligibility.bind(controller));
  app.get('/vacancies/mine', controller.listMine.bind(controller));
  app.post('/vacancies', controller.create.bind(controller));
  app.get('/vacancies/:vacancyId', controller.get.bind(controller));
  app.post('/vacancies/:vacancyId/close', controller.close.bind(controller));
}
