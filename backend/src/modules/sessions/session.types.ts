/**
 * backend/src/modules/sessions/session.types.ts
 *
 * WHY:
 * - A session is one issued login: many may be live per user.
 * - Live means: revokedAt is null AND expiresAt is in the future.
 *
 * RULES:
 * - The raw token never appears in these types; only its hash is stored.
 */

export type Session = {
  id: string;
  userId: string;
  issuedAt: Date;
  expiresAt: Date;
  revokedAt: Date | null;
};

export type IssuedSession = {
  sessionId: string;
  /** Raw token: returned to the client exactly once. */
  token: string;
  expiresAt: Date;
};
