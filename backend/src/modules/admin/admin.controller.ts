/**
 * backend/src/modules/admin/admin.controller.ts
 *
 * WHY:
 * - ADMIN-only HTTP surface: team approval, invoice overrides, expiry sweep.
 *
 * RULES:
 * - Every handler starts with requireSession(req, { role: 'ADMIN' }).
 * - No DB access here.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { requestMeta } from '../../shared/http/request-meta';

import type { MembershipService } from '../memberships';
import type { PlacementService } from '../placements';

import {
  adminInvoiceParamsSchema,
  expireMembershipsSchema,
  teamParamsSchema,
} from './admin.schemas';
import type { AdminService } from './admin.service';

export class AdminController {
  constructor(
    private readonly adminService: AdminService,
    private readonly placementService: PlacementService,
    private readonly membershipService: MembershipService,
  ) {}

  async listPendingTeams(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { role: 'ADMIN' });

    const teams = await this.adminService.listTeamsAwaitingApproval();
    return reply.status(200).send({ teams });
  }

  async approveTeam(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ADMIN' });

    const params = teamParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid team id', { issues: params.error.issues });
    }

    const team = await this.adminService.approveTeam({
      teamId: params.data.teamId,
      actorId: session.userId,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ team });
  }

  async listUnpaidInvoices(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { role: 'ADMIN' });

    const invoices = await this.placementService.listUnpaidInvoices();
    return reply.status(200).send({ invoices });
  }

  async markInvoicePaid(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ADMIN' });

    const params = adminInvoiceParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid invoice id', { issues: params.error.issues });
    }

    const invoice = await this.placementService.markInvoicePaid({
      invoiceId: params.data.invoiceId,
      source: 'ADMIN',
      actorId: session.userId,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ invoice });
  }

  async voidInvoice(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ADMIN' });

    const params = adminInvoiceParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid invoice id', { issues: params.error.issues });
    }

    const invoice = await this.placementService.voidInvoice({
      invoiceId: params.data.invoiceId,
      actorId: session.userId,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ invoice });
  }

  async expireMemberships(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { role: 'ADMIN' });

    const parsed = expireMembershipsSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const result = await this.membershipService.expireDue({
      now: parsed.data.now ? new Date(parsed.data.now) : undefined,
      meta: requestMeta(req),
    });

    return reply.status(200).send(result);
  }
}
