import { expect } from 'vitest';

import type { TestApp } from './build-test-app';
import { readJson } from './seed';

export type VacancyBody = {
  id: string;
  teamId: string;
  title: string;
  status: string;
};

export type InvoiceBody = {
  id: string;
  placementId: string;
  teamId: string;
  amountCents: number;
  currency: string;
  status: string;
  dueDate: string;
  paidSource: string | null;
  paymentIntentId: string | null;
};

export type PlacementBody = {
  id: string;
  candidateId: string;
  vacancyId: string;
  status: string;
};

export type ErrorBody = { error: { code: string; message: string } };

/**
 * Multi-step HTTP flows shared by the E2E specs.
 * Each helper asserts its own happy-path status so failures point at the step.
 */
export async function createVacancy(
  t: TestApp,
  cookie: string,
  overrides: Record<string, unknown> = {},
): Promise<VacancyBody> {
  const res = await t.app.inject({
    method: 'POST',
    url: '/vacancies',
    headers: { cookie },
    payload: {
      title: 'Centre back',
      description: 'First-team centre back for the coming season.',
      ...overrides,
    },
  });
  expect(res.statusCode).toBe(201);
  return readJson<{ vacancy: VacancyBody }>(res).vacancy;
}

export async function recordPlacement(
  t: TestApp,
  cookie: string,
  params: { vacancyId: string; candidateId: string },
): Promise<{ placement: PlacementBody; invoice: InvoiceBody }> {
  const res = await t.app.inject({
    method: 'POST',
    url: '/placements',
    headers: { cookie },
    payload: params,
  });
  expect(res.statusCode).toBe(201);
  return readJson<{ placement: PlacementBody; invoice: InvoiceBody }>(res);
}

export async function postWebhook(
  t: TestApp,
  event: { payload: string; signature: string | null },
): Promise<{ statusCode: number; outcome: string }> {
  const headers: Record<string, string> = { 'content-type': 'application/json' };
  if (event.signature !== null) headers['stripe-signature'] = event.signature;

  const res = await t.app.inject({
    method: 'POST',
    url: '/payments/webhook',
    headers,
    payload: event.payload,
  });
  return { statusCode: res.statusCode, outcome: readJson<{ outcome: string }>(res).outcome };
}
