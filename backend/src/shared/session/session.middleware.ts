/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Resolves the Authorization header to a session on every request.
 * - Populates req.authContext (userId, sessionId) when the token is live.
 * - Does NOT throw: endpoints decide if auth is required (requireSession).
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - No caching: a logout must take effect on the very next request.
 * - A presented-but-dead token marks tokenRejected so requireSession can
 *   answer AUTHENTICATION_FAILED instead of UNAUTHENTICATED.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { anonymousAuthContext } from '../http/auth-context';
import { readSessionToken, type SessionResolver } from './session.types';

export function registerSessionMiddleware(app: FastifyInstance, resolver: SessionResolver): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const token = readSessionToken(req);
    if (!token) return;

    const session = await resolver.resolve(token);
    if (!session) {
      req.authContext = anonymousAuthContext(true);
      return;
    }

    req.authContext = {
      userId: session.userId,
      sessionId: session.sessionId,
      tokenRejected: false,
    };
  });
}
