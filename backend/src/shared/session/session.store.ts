/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session lookup via Redis (through Cache interface).
 * - Sessions are instantly revocable via del(); TTL enforced at Redis level.
 *
 * RULES:
 * - Depends only on Cache interface (DIP). Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in middleware).
 * - A payload that fails schema validation is treated as missing and deleted.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { sessionDataSchema, SESSION_KEY_PREFIX } from './session.types';
import type { SessionData } from './session.types';
import { logger } from '../logger/logger';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  /**
   * Creates a new session and returns the session ID.
   * Used by the dev seed and tests; production sessions come from the identity service.
   */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });

    return sessionId;
  }

  /**
   * Loads session data by ID. Returns null if expired, not found or corrupted.
   */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      logger.warn('session.corrupted', { flow: 'session', reason: 'invalid_json', err });
      await this.destroy(sessionId);
      return null;
    }

    const parsed = sessionDataSchema.safeParse(decoded);
    if (!parsed.success) {
      logger.warn('session.corrupted', { flow: 'session', reason: 'invalid_shape' });
      await this.destroy(sessionId);
      return null;
    }

    return parsed.data;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }
}
