/**
 * backend/src/modules/placements/index.ts
 *
 * WHY:
 * - Public surface of the placements module (vacancy gate + admin invoice ops).
 */

export type { PlacementService } from './placement.service';
export type {
  Invoice,
  InvoicePaymentSource,
  InvoiceStatus,
  Placement,
  PlacementStatus,
  PlacementWithInvoice,
} from './placement.types';
