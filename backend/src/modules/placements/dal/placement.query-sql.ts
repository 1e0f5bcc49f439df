/**
 * backend/src/modules/placements/dal/placement.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for placements and invoices.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { InvoicesTable, PlacementsTable } from '../../../shared/db/schema';

export type PlacementRow = Selectable<PlacementsTable>;
export type InvoiceRow = Selectable<InvoicesTable>;

export async function selectPlacementByIdSql(
  db: DbExecutor,
  placementId: string,
): Promise<PlacementRow | undefined> {
  return db.selectFrom('placements').selectAll().where('id', '=', placementId).executeTakeFirst();
}

export async function selectPlacementByVacancyAndCandidateSql(
  db: DbExecutor,
  params: { vacancyId: string; candidateId: string },
): Promise<PlacementRow | undefined> {
  return db
    .selectFrom('placements')
    .selectAll()
    .where('vacancy_id', '=', params.vacancyId)
    .where('candidate_id', '=', params.candidateId)
    .executeTakeFirst();
}

export async function selectPlacementsByTeamSql(
  db: DbExecutor,
  teamId: string,
): Promise<PlacementRow[]> {
  return db
    .selectFrom('placements')
    .selectAll()
    .where('team_id', '=', teamId)
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .execute();
}

export async function selectInvoiceByIdSql(
  db: DbExecutor,
  invoiceId: string,
): Promise<InvoiceRow | undefined> {
  return db.selectFrom('invoices').selectAll().where('id', '=', invoiceId).executeTakeFirst();
}

export async function selectInvoicesByTeamSql(
  db: DbExecutor,
  teamId: string,
): Promise<InvoiceRow[]> {
  return db.selectFrom('invoices').selectAll().where('team_id', '=', teamId).execute();
}

export async function selectUnpaidInvoiceIdsByTeamSql(
  db: DbExecutor,
  teamId: string,
): Promise<string[]> {
  const rows = await db
    .selectFrom('invoices')
    .select(['id'])
    .where('team_id', '=', teamId)
    .where('status', '=', 'UNPAID')
    .execute();

  return rows.map((r) => r.id);
}

export async function selectUnpaidInvoicesSql(db: DbExecutor): Promise<InvoiceRow[]> {
  return db
    .selectFrom('invoices')
    .selectAll()
    .where('status', '=', 'UNPAID')
    .orderBy('due_date', 'asc')
    .orderBy('id', 'asc')
    .execute();
}
