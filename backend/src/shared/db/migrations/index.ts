/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static migration registry: the runner and the test database apply the
 *   same list without scanning the filesystem.
 *
 * RULES:
 * - Names sort in apply order (zero-padded prefix).
 * - Never edit an applied migration; add a new one.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_users';
import * as m0002 from './0002_memberships_payments';
import * as m0003 from './0003_vacancies_placements';
import * as m0004 from './0004_audit_events';

export const migrations: Record<string, Migration> = {
  '0001_users': m0001,
  '0002_memberships_payments': m0002,
  '0003_vacancies_placements': m0003,
  '0004_audit_events': m0004,
};
