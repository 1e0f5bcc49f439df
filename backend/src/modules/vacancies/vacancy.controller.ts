/**
 * backend/src/modules/vacancies/vacancy.controller.ts
 *
 * WHY:
 * - Maps HTTP -> VacancyService calls.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { createVacancySchema, vacancyParamsSchema } from './vacancy.schemas';
import type { VacancyService } from './vacancy.service';

export class VacancyController {
  constructor(private readonly vacancyService: VacancyService) {}

  async eligibility(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const eligibility = await this.vacancyService.getEligibility(session.userId);
    return reply.status(200).send(eligibility);
  }

  async create(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const parsed = createVacancySchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const vacancy = await this.vacancyService.create({
      teamId: session.userId,
      input: parsed.data,
      meta: requestMeta(req),
    });

    return reply.status(201).send({ vacancy });
  }

  async listMine(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const vacancies = await this.vacancyService.listMine(session.userId);
    return reply.status(200).send({ vacancies });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const params = vacancyParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid vacancy id', { issues: params.error.issues });
    }

    const vacancy = await this.vacancyService.get({
      vacancyId: params.data.vacancyId,
      viewerId: session.userId,
    });
    return reply.status(200).send({ vacancy });
  }

  async close(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const params = vacancyParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid vacancy id', { issues: params.error.issues });
    }

    const vacancy = await this.vacancyService.close({
      teamId: session.userId,
      vacancyId: params.data.vacancyId,
      meta: requestMeta(req),
    });
    return reply.status(200).send({ vacancy });
  }
}
