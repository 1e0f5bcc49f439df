/**
 * backend/src/modules/placements/placement.queries.ts
 *
 * WHY:
 * - Shapes placement/invoice rows into domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../shared/db/db';
import {
  selectInvoiceByIdSql,
  selectInvoicesByTeamSql,
  selectPlacementByIdSql,
  selectPlacementByVacancyAndCandidateSql,
  selectPlacementsByTeamSql,
  selectUnpaidInvoiceIdsByTeamSql,
  selectUnpaidInvoicesSql,
} from './dal/placement.query-sql';
import type { InvoiceRow, PlacementRow } from './dal/placement.query-sql';
import type { Invoice, Placement, PlacementWithInvoice } from './placement.types';

function toDateOrNull(value: Date | null): Date | null {
  return value === null ? null : new Date(value);
}

function toPlacement(row: PlacementRow): Placement {
  return {
    id: row.id,
    candidateId: row.candidate_id,
    teamId: row.team_id,
    vacancyId: row.vacancy_id,
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function toInvoice(row: InvoiceRow): Invoice {
  return {
    id: row.id,
    placementId: row.placement_id,
    teamId: row.team_id,
    amountCents: row.amount_cents,
    currency: row.currency,
    status: row.status,
    dueDate: new Date(row.due_date),
    paidAt: toDateOrNull(row.paid_at),
    paidSource: row.paid_source,
    voidedAt: toDateOrNull(row.voided_at),
    paymentIntentId: row.payment_intent_id,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export async function getPlacementById(
  db: DbExecutor,
  placementId: string,
): Promise<Placement | undefined> {
  const row = await selectPlacementByIdSql(db, placementId);
  if (!row) return undefined;
  return toPlacement(row);
}

export async function getPlacementByVacancyAndCandidate(
  db: DbExecutor,
  params: { vacancyId: string; candidateId: string },
): Promise<Placement | undefined> {
  const row = await selectPlacementByVacancyAndCandidateSql(db, params);
  if (!row) return undefined;
  return toPlacement(row);
}

export async function getInvoiceById(
  db: DbExecutor,
  invoiceId: string,
): Promise<Invoice | undefined> {
  const row = await selectInvoiceByIdSql(db, invoiceId);
  if (!row) return undefined;
  return toInvoice(row);
}

export async function getUnpaidInvoiceIdsForTeam(db: DbExecutor, teamId: string): Promise<string[]> {
  return selectUnpaidInvoiceIdsByTeamSql(db, teamId);
}

export async function listUnpaidInvoices(db: DbExecutor): Promise<Invoice[]> {
  const rows = await selectUnpaidInvoicesSql(db);
  return rows.map(toInvoice);
}

/**
 * Newest placement first, each with its invoice.
 * Every placement has exactly one invoice (created in the same transaction).
 */
export async function listPlacementsWithInvoicesForTeam(
  db: DbExecutor,
  teamId: string,
): Promise<PlacementWithInvoice[]> {
  const [placementRows, invoiceRows] = await Promise.all([
    selectPlacementsByTeamSql(db, teamId),
    selectInvoicesByTeamSql(db, teamId),
  ]);

  const invoicesByPlacement = new Map(invoiceRows.map((row) => [row.placement_id, toInvoice(row)]));

  const out: PlacementWithInvoice[] = [];
  for (const row of placementRows) {
    const invoice = invoicesByPlacement.get(row.id);
    if (invoice) out.push({ placement: toPlacement(row), invoice });
  }
  return out;
}
