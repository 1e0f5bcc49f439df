/**
 * backend/src/modules/payments/payment.controller.ts
 *
 * WHY:
 * - Maps the gateway's webhook POST -> PaymentWebhookService.
 *
 * RULES:
 * - The body arrives as a raw Buffer (signature is computed over exact bytes).
 * - Always 200 unless processing failed (then the error handler answers 500 and
 *   the gateway retries).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requestMeta } from '../../shared/http/request-meta';
import type { PaymentWebhookService } from './payment-webhook.service';

export const SIGNATURE_HEADER = 'stripe-signature';

function headerValue(value: string | string[] | undefined): string | null {
  if (Array.isArray(value)) return value[0] ?? null;
  return value ?? null;
}

export class PaymentController {
  constructor(private readonly webhookService: PaymentWebhookService) {}

  async webhook(req: FastifyRequest, reply: FastifyReply) {
    const rawBody = req.body;
    if (!Buffer.isBuffer(rawBody)) {
      throw AppError.validationError('Webhook body must be raw JSON');
    }

    const result = await this.webhookService.handleWebhook({
      rawBody,
      signature: headerValue(req.headers[SIGNATURE_HEADER]),
      meta: requestMeta(req),
    });

    return reply.status(200).send({ received: true, outcome: result.outcome });
  }
}
