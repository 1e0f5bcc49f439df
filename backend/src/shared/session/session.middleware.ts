/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads session cookie on every request.
 * - If a valid session exists, populates req.authContext (userId, role).
 * - Does NOT throw if no session; endpoints decide if auth is required.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Best-effort: if cookie is missing/invalid/expired, authContext stays null.
 * - No business logic (just session → authContext mapping).
 * - Routes registered with `config: { sessionless: true }` (payment webhooks, health)
 *   skip the store lookup entirely: they are called by machines, never with a cookie.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';

declare module 'fastify' {
  interface FastifyContextConfig {
    sessionless?: boolean;
  }
}

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function registerSessionMiddleware(app: FastifyInstance, sessionStore: SessionStore): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    if (req.routeOptions.config.sessionless) return;

    const cookies = parseCookies(req.headers.cookie);
    const sessionId = cookies[SESSION_COOKIE_NAME];
    if (!sessionId) return;

    const session = await sessionStore.get(sessionId);
    if (!session) return;

    req.authContext = {
      userId: session.userId,
      role: session.role,
      sessionId,
    };
  });
}
