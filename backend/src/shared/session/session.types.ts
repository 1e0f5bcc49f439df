/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in Redis (via Cache) with a TTL.
 * - Sessions are ISSUED by the identity service that owns login; this backend
 *   only reads them (same Redis, same key layout, same cookie).
 *
 * RULES:
 * - Session data must be JSON-serializable (stored in Redis as JSON string).
 * - Never store passwords or tokens in session data.
 */

import { z } from 'zod';

export const sessionDataSchema = z.object({
  userId: z.string().uuid(),
  role: z.enum(['CANDIDATE', 'TEAM', 'ADMIN']),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof sessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/**
 * Session prefix in Redis. Full key: `session:{sessionId}`.
 * Keeps session keys isolated from other cache entries.
 */
export const SESSION_KEY_PREFIX = 'session';
