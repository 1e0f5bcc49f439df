import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { User } from '../../src/modules/users';
import { buildTestApp, type TestApp } from '../helpers/build-test-app';
import { readJson, seedUser, sessionCookieFor } from '../helpers/seed';
import { createVacancy, type ErrorBody, type VacancyBody } from '../helpers/flows';

describe('vacancies', () => {
  let t: TestApp;
  let team: User;
  let cookie: string;

  beforeEach(async () => {
    t = await buildTestApp();
    team = await seedUser(t.deps.db, 'TEAM');
    cookie = await sessionCookieFor(t.deps.sessionStore, team);
  });

  afterEach(async () => {
    await t.close();
  });

  it('an unapproved team cannot create vacancies', async () => {
    const pending = await seedUser(t.deps.db, 'TEAM', { isApproved: false });
    const pendingCookie = await sessionCookieFor(t.deps.sessionStore, pending);

    const eligibility = await t.app.inject({
      method: 'GET',
      url: '/vacancies/eligibility',
      headers: { cookie: pendingCookie },
    });
    expect(readJson<{ canCreateVacancy: boolean; teamApproved: boolean }>(eligibility)).toMatchObject(
      { canCreateVacancy: false, teamApproved: false },
    );

    const res = await t.app.inject({
      method: 'POST',
      url: '/vacancies',
      headers: { cookie: pendingCookie },
      payload: { title: 'Goalkeeper', description: 'Second-choice goalkeeper.' },
    });
    expect(res.statusCode).toBe(403);
    expect(readJson<ErrorBody>(res).error.code).toBe('FORBIDDEN');
  });

  it('candidates cannot create vacancies', async () => {
    const candidate = await seedUser(t.deps.db, 'CANDIDATE');
    const res = await t.app.inject({
      method: 'POST',
      url: '/vacancies',
      headers: { cookie: await sessionCookieFor(t.deps.sessionStore, candidate) },
      payload: { title: 'Goalkeeper', description: 'Second-choice goalkeeper.' },
    });

    expect(res.statusCode).toBe(403);
  });

  it('rejects a salary range that runs backwards', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/vacancies',
      headers: { cookie },
      payload: {
        title: 'Goalkeeper',
        description: 'Second-choice goalkeeper.',
        salaryMin: 50000,
        salaryMax: 40000,
      },
    });

    expect(res.statusCode).toBe(400);
    expect(readJson<ErrorBody>(res).error.code).toBe('VALIDATION_ERROR');
  });

  it('creates an ACTIVE vacancy by default and lists it for its team', async () => {
    const vacancy = await createVacancy(t, cookie, { location: 'Leeds', salaryMin: 30000 });
    expect(vacancy).toMatchObject({ teamId: team.id, title: 'Centre back', status: 'ACTIVE' });

    const res = await t.app.inject({ method: 'GET', url: '/vacancies/mine', headers: { cookie } });
    const { vacancies } = readJson<{ vacancies: VacancyBody[] }>(res);
    expect(vacancies.map((v) => v.id)).toEqual([vacancy.id]);
  });

  it('drafts are visible to their team only', async () => {
    const draft = await createVacancy(t, cookie, { status: 'DRAFT' });

    const own = await t.app.inject({
      method: 'GET',
      url: `/vacancies/${draft.id}`,
      headers: { cookie },
    });
    expect(own.statusCode).toBe(200);

    const candidate = await seedUser(t.deps.db, 'CANDIDATE');
    const other = await t.app.inject({
      method: 'GET',
      url: `/vacancies/${draft.id}`,
      headers: { cookie: await sessionCookieFor(t.deps.sessionStore, candidate) },
    });
    expect(other.statusCode).toBe(404);
  });

  it('closing a vacancy is one-way', async () => {
    const vacancy = await createVacancy(t, cookie);

    const closed = await t.app.inject({
      method: 'POST',
      url: `/vacancies/${vacancy.id}/close`,
      headers: { cookie },
    });
    expect(closed.statusCode).toBe(200);
    expect(readJson<{ vacancy: VacancyBody }>(closed).vacancy.status).toBe('CLOSED');

    const again = await t.app.inject({
      method: 'POST',
      url: `/vacancies/${vacancy.id}/close`,
      headers: { cookie },
    });
    expect(again.statusCode).toBe(409);
    expect(readJson<ErrorBody>(again).error.code).toBe('CONFLICT');
  });
});
