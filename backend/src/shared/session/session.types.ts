/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - The middleware needs "raw token → live session" without knowing where
 *   sessions are stored. The sessions module implements SessionResolver.
 *
 * RULES:
 * - The client sends the raw session token as the whole Authorization header
 *   value (no "Bearer " prefix).
 * - Never log or persist the raw token.
 */

import type { FastifyRequest } from 'fastify';

export type ResolvedSession = Readonly<{
  sessionId: string;
  userId: string;
}>;

export interface SessionResolver {
  /** Returns the live (not revoked, not expired) session for a raw token, or null. */
  resolve(rawToken: string): Promise<ResolvedSession | null>;
}

/** Raw token from the Authorization header; null when absent or blank. */
export function readSessionToken(req: FastifyRequest): string | null {
  const raw = req.headers.authorization;
  const token = raw?.trim();
  return token ? token : null;
}
