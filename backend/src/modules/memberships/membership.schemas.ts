/**
 * backend/src/modules/memberships/membership.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Memberships module.
 *
 * RULES:
 * - Plan names are validated as strings here and resolved by the service,
 *   so an unknown plan surfaces as INVALID_PLAN rather than VALIDATION_ERROR.
 */

import { z } from 'zod';

export const createPaymentIntentSchema = z.object({
  planType: z.string().trim().min(1).max(50),
});

export const confirmPaymentSchema = z.object({
  paymentIntentId: z.string().trim().min(1).max(255),
});

export const upgradeSchema = z.object({
  planType: z.string().trim().min(1).max(50),
});

export type CreatePaymentIntentInput = z.infer<typeof createPaymentIntentSchema>;
export type ConfirmPaymentInput = z.infer<typeof confirmPaymentSchema>;
export type UpgradeInput = z.infer<typeof upgradeSchema>;
