/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - Session middleware populates this from the server-side session.
 * - Before that, all fields are null (unauthenticated request).
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets stub (all null) on every request.
 * 2. Session middleware overwrites with real values if a valid cookie exists.
 * 3. Controllers read req.authContext through requireSession().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserRole } from '../../modules/users/user.types';

export type AuthContext = {
  userId: string | null;
  role: UserRole | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null as unknown as AuthContext);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = {
      userId: null,
      role: null,
      sessionId: null,
    };

    done();
  });
}
