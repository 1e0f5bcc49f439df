import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../../src/shared/db/db';
import type { SessionStore } from '../../src/shared/session/session.store';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { getUserById } from '../../src/modules/users';
import type { User, UserRole } from '../../src/modules/users';

/**
 * Inserts a user directly (identity service is out of scope).
 * Teams are approved unless `isApproved: false` is passed.
 */
export async function seedUser(
  db: DbExecutor,
  role: UserRole,
  opts: { email?: string; name?: string; isApproved?: boolean } = {},
): Promise<User> {
  const { id } = await new UserRepo(db).insertUser({
    email: opts.email ?? `${role.toLowerCase()}-${randomUUID().slice(0, 8)}@example.com`,
    name: opts.name ?? `Test ${role}`,
    role,
    isApproved: opts.isApproved ?? role === 'TEAM',
  });

  const user = await getUserById(db, id);
  if (!user) throw new Error('seeded user not found');
  return user;
}

/**
 * Issues a session the way the identity service would and returns the Cookie header value.
 */
export async function sessionCookieFor(sessionStore: SessionStore, user: User): Promise<string> {
  const sessionId = await sessionStore.create({
    userId: user.id,
    role: user.role,
    createdAt: new Date().toISOString(),
  });
  return `sid=${sessionId}`;
}

export function readJson<T>(res: { json: () => unknown }): T {
  // Fastify inject returns `any` for json(); narrow at the call site.
  return res.json() as T;
}
