/**
 * backend/src/modules/placements/placement.constants.ts
 *
 * WHY:
 * - Fixed placement fee and payment terms, in one place.
 */

/** $50.00 per confirmed placement. */
export const PLACEMENT_FEE_CENTS = 5000;

export const INVOICE_DUE_DAYS = 14;

export const INVOICE_INTENT_RATE_LIMIT = { limit: 10, windowSeconds: 15 * 60 } as const;
