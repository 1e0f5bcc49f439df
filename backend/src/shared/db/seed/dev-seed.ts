/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates (if missing):
 * - an ADMIN
 * - an approved TEAM
 * - a CANDIDATE
 *
 * Idempotent: safe to run on every start.
 *
 * IMPORTANT:
 * - Issues one session per seeded user and prints the session id to logs
 *   (dev convenience: `curl --cookie sid=<id>`). Never run in production.
 */

import type { DbExecutor } from '../db';
import type { SessionStore } from '../../session/session.store';
import { logger } from '../../logger/logger';
import { getUserByEmail, UserRepo } from '../../../modules/users';
import type { User, UserRole } from '../../../modules/users';

export type DevSeedOptions = {
  adminEmail: string;
  teamEmail: string;
  candidateEmail: string;
};

export type DevSeedResult = {
  admin: User;
  team: User;
  candidate: User;
};

async function ensureUser(
  db: DbExecutor,
  params: { email: string; name: string; role: UserRole },
): Promise<User> {
  const flow = 'seed.dev';

  const existing = await getUserByEmail(db, params.email);
  if (existing) {
    logger.info('seed.user.exists', { flow, userId: existing.id, role: existing.role });
    return existing;
  }

  const { id } = await new UserRepo(db).insertUser({
    email: params.email,
    name: params.name,
    role: params.role,
    isApproved: params.role === 'TEAM',
  });

  const created = await getUserByEmail(db, params.email);
  if (!created) {
    throw new Error(`Seeded user ${id} could not be read back`);
  }

  logger.info('seed.user.created', { flow, userId: created.id, role: created.role });
  return created;
}

export async function runDevSeed(opts: {
  db: DbExecutor;
  sessionStore?: SessionStore;
  options: DevSeedOptions;
}): Promise<DevSeedResult> {
  const { db, options } = opts;

  const admin = await ensureUser(db, {
    email: options.adminEmail,
    name: 'Marketplace Admin',
    role: 'ADMIN',
  });
  const team = await ensureUser(db, {
    email: options.teamEmail,
    name: 'Riverside Athletic FC',
    role: 'TEAM',
  });
  const candidate = await ensureUser(db, {
    email: options.candidateEmail,
    name: 'Sample Candidate',
    role: 'CANDIDATE',
  });

  if (opts.sessionStore) {
    for (const user of [admin, team, candidate]) {
      const sessionId = await opts.sessionStore.create({
        userId: user.id,
        role: user.role,
        createdAt: new Date().toISOString(),
      });

      logger.info('seed.session.created', {
        flow: 'seed.dev',
        userId: user.id,
        role: user.role,

        // DEV ONLY (do NOT do this in prod)
        sessionCookie: `sid=${sessionId}`,
      });
    }
  }

  return { admin, team, candidate };
}
