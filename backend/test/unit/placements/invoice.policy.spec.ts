import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  assertInvoiceOwnedBy,
  assertInvoicePayable,
  assertNoUnpaidInvoices,
  computeDueDate,
} from '../../../src/modules/placements/policies/invoice.policy';
import type { Invoice } from '../../../src/modules/placements/placement.types';

const issued = new Date('2026-05-10T09:30:00.000Z');

const invoice: Invoice = {
  id: 'inv-1',
  placementId: 'pl-1',
  teamId: 'team-1',
  amountCents: 5000,
  currency: 'usd',
  status: 'UNPAID',
  dueDate: computeDueDate(issued),
  paidAt: null,
  paidSource: null,
  voidedAt: null,
  paymentIntentId: null,
  createdAt: issued,
  updatedAt: issued,
};

describe('invoice policy', () => {
  it('due date is 14 days after issue', () => {
    expect(invoice.dueDate.toISOString()).toBe('2026-05-24T09:30:00.000Z');
  });

  it("another team's invoice reads as not found", () => {
    expect(() => assertInvoiceOwnedBy(invoice, 'team-2')).toThrowError('Invoice not found');
    expect(() => assertInvoiceOwnedBy(undefined, 'team-1')).toThrowError('Invoice not found');
    expect(() => assertInvoiceOwnedBy(invoice, 'team-1')).not.toThrow();
  });

  it('only UNPAID invoices are payable', () => {
    expect(() => assertInvoicePayable(invoice)).not.toThrow();
    expect(() => assertInvoicePayable({ ...invoice, status: 'PAID' })).toThrowError(
      'Invoice is already paid',
    );
    expect(() => assertInvoicePayable({ ...invoice, status: 'VOID' })).toThrowError(
      'Invoice has been voided',
    );
  });

  it('vacancy gate rejects any unpaid invoice with 402', () => {
    expect(() => assertNoUnpaidInvoices([])).not.toThrow();

    expect.assertions(4);
    try {
      assertNoUnpaidInvoices(['inv-1']);
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.code).toBe('UNPAID_INVOICE_EXISTS');
      expect(e.status).toBe(402);
    }
  });
});
