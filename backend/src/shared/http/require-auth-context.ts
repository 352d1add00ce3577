/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session" logic.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: string;
}>;

/**
 * Guard sequence (LOCKED):
 * 1) token presented but rejected -> 401 AUTHENTICATION_FAILED "Invalid or expired token"
 * 2) no token at all              -> 401 UNAUTHENTICATED
 */
export function requireSession(req: Pick<FastifyRequest, 'authContext'>): RequiredAuthContext {
  const ctx = req.authContext;

  if (ctx?.sessionId && ctx.userId) {
    return { sessionId: ctx.sessionId, userId: ctx.userId };
  }

  if (ctx?.tokenRejected) throw AppError.authenticationFailed();
  throw AppError.unauthenticated();
}
