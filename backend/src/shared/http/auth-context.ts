/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication state is resolved once per request and read everywhere else.
 * - The stub (all null) is set first; session middleware overwrites it when
 *   the Authorization header carries a live session token.
 *
 * FIELDS:
 * - tokenRejected: a token was presented but is unknown, revoked or expired.
 *   requireSession uses it to tell "no credentials" from "bad credentials".
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

export type AuthContext = {
  userId: string | null;
  sessionId: string | null;
  tokenRejected: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function anonymousAuthContext(tokenRejected = false): AuthContext {
  return { userId: null, sessionId: null, tokenRejected };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = anonymousAuthContext();
    done();
  });
}
