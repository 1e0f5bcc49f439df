/**
 * backend/src/modules/placements/placement.errors.ts
 *
 * WHY:
 * - Placements module owns placement/invoice semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Another team's invoice reads as NOT_FOUND.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const PlacementErrors = {
  duplicatePlacement(meta?: AppErrorMeta) {
    return new AppError({
      code: 'DUPLICATE_PLACEMENT',
      status: 409,
      message: 'This candidate has already been placed for this vacancy.',
      meta,
    });
  },

  unpaidInvoiceExists(meta?: AppErrorMeta) {
    return new AppError({
      code: 'UNPAID_INVOICE_EXISTS',
      status: 402,
      message: 'Settle your outstanding placement invoices before posting new vacancies.',
      meta,
    });
  },

  invoiceNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Invoice not found', meta);
  },

  invoiceVoid(meta?: AppErrorMeta) {
    return AppError.conflict('Invoice has been voided', meta);
  },

  invoiceAlreadyPaid(meta?: AppErrorMeta) {
    return AppError.conflict('Invoice is already paid', meta);
  },

  vacancyNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Vacancy not found', meta);
  },
} as const;
