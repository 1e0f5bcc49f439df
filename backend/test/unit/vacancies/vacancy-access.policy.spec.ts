import { describe, it, expect } from 'vitest';
import {
  assertVacancyOpen,
  assertVacancyOwnedBy,
  assertVacancyVisibleTo,
} from '../../../src/modules/vacancies/policies/vacancy-access.policy';
import { createVacancySchema } from '../../../src/modules/vacancies/vacancy.schemas';
import type { Vacancy } from '../../../src/modules/vacancies/vacancy.types';

const now = new Date('2026-04-01T00:00:00.000Z');

const vacancy: Vacancy = {
  id: 'vac-1',
  teamId: 'team-1',
  title: 'Goalkeeper',
  description: 'First-team goalkeeper for the coming season.',
  location: null,
  positionType: null,
  experienceLevel: null,
  salaryMin: null,
  salaryMax: null,
  expiryDate: null,
  status: 'ACTIVE',
  createdAt: now,
  updatedAt: now,
};

describe('vacancy access policy', () => {
  it("owner check hides other teams' vacancies", () => {
    expect(() => assertVacancyOwnedBy(vacancy, 'team-1')).not.toThrow();
    expect(() => assertVacancyOwnedBy(vacancy, 'team-2')).toThrowError('Vacancy not found');
  });

  it('drafts are only visible to their team', () => {
    const draft: Vacancy = { ...vacancy, status: 'DRAFT' };
    expect(() => assertVacancyVisibleTo(draft, 'team-1')).not.toThrow();
    expect(() => assertVacancyVisibleTo(draft, 'cand-1')).toThrowError('Vacancy not found');
    expect(() => assertVacancyVisibleTo(vacancy, 'cand-1')).not.toThrow();
  });

  it('a closed vacancy cannot be closed again', () => {
    expect(() => assertVacancyOpen({ ...vacancy, status: 'CLOSED' })).toThrowError(
      'Vacancy is already closed',
    );
  });
});

describe('createVacancySchema', () => {
  it('defaults status to ACTIVE', () => {
    const parsed = createVacancySchema.parse({
      title: 'Striker',
      description: 'Academy striker wanted for U21 squad.',
    });
    expect(parsed.status).toBe('ACTIVE');
  });

  it('rejects an inverted salary range', () => {
    const parsed = createVacancySchema.safeParse({
      title: 'Striker',
      description: 'Academy striker wanted for U21 squad.',
      salaryMin: 50000,
      salaryMax: 40000,
    });
    expect(parsed.success).toBe(false);
  });
});
