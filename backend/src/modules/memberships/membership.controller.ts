/**
 * backend/src/modules/memberships/membership.controller.ts
 *
 * WHY:
 * - Maps HTTP -> MembershipService calls.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 * - Candidate-only endpoints go through requireSession({ role: 'CANDIDATE' }).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { confirmPaymentSchema, createPaymentIntentSchema, upgradeSchema } from './membership.schemas';
import { requestMeta } from '../../shared/http/request-meta';
import type { MembershipService } from './membership.service';

export class MembershipController {
  constructor(private readonly membershipService: MembershipService) {}

  listPlans(_req: FastifyRequest, reply: FastifyReply) {
    return reply.status(200).send({ plans: this.membershipService.listPlans() });
  }

  async createPaymentIntent(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'CANDIDATE' });

    const parsed = createPaymentIntentSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const intent = await this.membershipService.createPaymentIntent({
      candidateId: session.userId,
      planType: parsed.data.planType,
      meta: requestMeta(req),
    });

    return reply.status(201).send(intent);
  }

  async confirmPayment(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'CANDIDATE' });

    const parsed = confirmPaymentSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const membership = await this.membershipService.confirmPayment({
      intentId: parsed.data.paymentIntentId,
      candidateId: session.userId,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ membership });
  }

  async upgrade(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'CANDIDATE' });

    const parsed = upgradeSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const intent = await this.membershipService.upgrade({
      candidateId: session.userId,
      planType: parsed.data.planType,
      meta: requestMeta(req),
    });

    return reply.status(201).send(intent);
  }

  async cancel(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'CANDIDATE' });

    const membership = await this.membershipService.cancel({
      candidateId: session.userId,
      meta: requestMeta(req),
    });

    return reply.status(200).send({ membership });
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'CANDIDATE' });

    const [membership, isActive] = await Promise.all([
      this.membershipService.getCurrent(session.userId),
      this.membershipService.isActive(session.userId),
    ]);

    return reply.status(200).send({ membership, isActive });
  }

  async history(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'CANDIDATE' });

    const memberships = await this.membershipService.history(session.userId);
    return reply.status(200).send({ memberships });
  }
}
