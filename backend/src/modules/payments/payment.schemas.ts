/**
 * backend/src/modules/payments/payment.schemas.ts
 *
 * WHY:
 * - Shape of the payment intent carried by verified gateway events.
 * - metadata.kind decides which manager handles the event.
 *
 * RULES:
 * - A payload that fails these schemas is acknowledged and ignored.
 */

import { z } from 'zod';

export const HANDLED_EVENT_TYPES = [
  'payment_intent.succeeded',
  'payment_intent.payment_failed',
  'payment_intent.canceled',
] as const;

export type HandledEventType = (typeof HANDLED_EVENT_TYPES)[number];

export function isHandledEventType(type: string): type is HandledEventType {
  return HANDLED_EVENT_TYPES.some((t) => t === type);
}

const membershipMetadataSchema = z.object({
  kind: z.literal('MEMBERSHIP'),
  candidateId: z.string().uuid(),
  planType: z.string().min(1),
});

const invoiceMetadataSchema = z.object({
  kind: z.literal('PLACEMENT_INVOICE'),
  invoiceId: z.string().uuid(),
  teamId: z.string().uuid(),
});

export const webhookIntentSchema = z.object({
  id: z.string().min(1),
  object: z.literal('payment_intent'),
  status: z.string(),
  metadata: z.discriminatedUnion('kind', [membershipMetadataSchema, invoiceMetadataSchema]),
});

export type WebhookIntent = z.infer<typeof webhookIntentSchema>;
