import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { Db } from '../../src/shared/db/db';
import { isUniqueViolation } from '../../src/shared/db/pg-errors';
import { PlacementRepo } from '../../src/modules/placements/dal/placement.repo';
import { VacancyRepo } from '../../src/modules/vacancies/dal/vacancy.repo';
import {
  getInvoiceById,
  getUnpaidInvoiceIdsForTeam,
  listPlacementsWithInvoicesForTeam,
} from '../../src/modules/placements/placement.queries';
import { createMemDb } from '../helpers/mem-db';
import { seedUser } from '../helpers/seed';

const NOW = new Date('2026-06-01T10:00:00.000Z');

describe('placements DAL', () => {
  let db: Db;
  let repo: PlacementRepo;
  let teamId: string;
  let candidateId: string;
  let vacancyId: string;

  beforeEach(async () => {
    db = await createMemDb();
    repo = new PlacementRepo(db);
    teamId = (await seedUser(db, 'TEAM')).id;
    candidateId = (await seedUser(db, 'CANDIDATE')).id;
    vacancyId = (
      await new VacancyRepo(db).insertVacancy({
        teamId,
        title: 'Left back',
        description: 'Left back for the reserve side.',
        location: null,
        positionType: null,
        experienceLevel: null,
        salaryMin: null,
        salaryMax: null,
        expiryDate: null,
        status: 'ACTIVE',
      })
    ).id;
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function placementWithInvoice() {
    const { id: placementId } = await repo.insertPlacement({ teamId, candidateId, vacancyId });
    const { id: invoiceId } = await repo.insertInvoice({
      placementId,
      teamId,
      amountCents: 5000,
      currency: 'usd',
      dueDate: new Date('2026-06-15T10:00:00.000Z'),
    });
    return { placementId, invoiceId };
  }

  it('insertInvoice creates an UNPAID invoice visible to the vacancy gate', async () => {
    const { invoiceId } = await placementWithInvoice();

    expect(await getUnpaidInvoiceIdsForTeam(db, teamId)).toEqual([invoiceId]);

    const [row] = await listPlacementsWithInvoicesForTeam(db, teamId);
    expect(row?.placement.status).toBe('PENDING');
    expect(row?.invoice).toMatchObject({ id: invoiceId, amountCents: 5000, status: 'UNPAID' });
  });

  it('the (vacancy, candidate) pair is unique', async () => {
    await repo.insertPlacement({ teamId, candidateId, vacancyId });

    let caught: unknown;
    try {
      await repo.insertPlacement({ teamId, candidateId, vacancyId });
    } catch (err) {
      caught = err;
    }
    expect(isUniqueViolation(caught)).toBe(true);
  });

  it('markInvoicePaid and voidInvoice are guarded on UNPAID', async () => {
    const { invoiceId } = await placementWithInvoice();

    expect(
      await repo.markInvoicePaid({ invoiceId, source: 'ADMIN', paymentIntentId: null, now: NOW }),
    ).toBe(true);
    expect(await repo.voidInvoice({ invoiceId, now: NOW })).toBe(false);
    expect(
      await repo.markInvoicePaid({ invoiceId, source: 'ADMIN', paymentIntentId: null, now: NOW }),
    ).toBe(false);

    const invoice = await getInvoiceById(db, invoiceId);
    expect(invoice?.status).toBe('PAID');
    expect(invoice?.paidSource).toBe('ADMIN');
    expect(invoice?.paidAt?.toISOString()).toBe(NOW.toISOString());
    expect(await getUnpaidInvoiceIdsForTeam(db, teamId)).toEqual([]);
  });
});
