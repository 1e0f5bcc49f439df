/**
 * backend/src/modules/placements/placement.controller.ts
 *
 * WHY:
 * - Maps HTTP -> PlacementService calls (team-facing endpoints).
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Admin invoice endpoints live in the admin module.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';
import { invoiceParamsSchema, recordPlacementSchema } from './placement.schemas';
import type { PlacementService } from './placement.service';

export class PlacementController {
  constructor(private readonly placementService: PlacementService) {}

  async recordPlacement(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const parsed = recordPlacementSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const result = await this.placementService.recordPlacement({
      teamId: session.userId,
      candidateId: parsed.data.candidateId,
      vacancyId: parsed.data.vacancyId,
      meta: requestMeta(req),
    });

    return reply.status(201).send(result);
  }

  async listPlacements(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const placements = await this.placementService.listTeamPlacements(session.userId);
    return reply.status(200).send({ placements });
  }

  async createInvoicePaymentIntent(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'TEAM' });

    const params = invoiceParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid invoice id', { issues: params.error.issues });
    }

    const intent = await this.placementService.createInvoicePaymentIntent({
      teamId: session.userId,
      invoiceId: params.data.invoiceId,
      meta: requestMeta(req),
    });

    return reply.status(201).send(intent);
  }
}
