/**
 * backend/src/modules/sessions/session.service.ts
 *
 * WHY:
 * - Owns the token lifecycle: issue → resolve (per request) → revoke.
 * - Implements SessionResolver for the session middleware.
 *
 * RULES:
 * - Tokens are 32 random bytes (base64url); only SHA-256 hashes are stored.
 * - resolve() is a pure read, executed on every request (no caching).
 * - issue() accepts an executor so registration can issue inside its transaction.
 * - `now` is injectable so tests can move the clock.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { generateSecureToken } from '../../shared/security/token';
import type { ResolvedSession, SessionResolver } from '../../shared/session/session.types';
import type { SessionRepo } from './dal/session.repo';
import { getLiveSessionByTokenHash } from './queries/session.queries';
import type { IssuedSession } from './session.types';

const SESSION_TOKEN_BYTES = 32;

export class SessionService implements SessionResolver {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      sessionRepo: SessionRepo;
      tokenHasher: TokenHasher;
      ttlSeconds: number;
      now?: () => Date;
    },
  ) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  async issue(params: { userId: string; db?: DbExecutor }): Promise<IssuedSession> {
    const token = generateSecureToken(SESSION_TOKEN_BYTES);
    const issuedAt = this.now();
    const expiresAt = new Date(issuedAt.getTime() + this.deps.ttlSeconds * 1000);

    const repo = params.db ? this.deps.sessionRepo.withDb(params.db) : this.deps.sessionRepo;
    const { id } = await repo.insertSession({
      userId: params.userId,
      tokenHash: this.deps.tokenHasher.hash(token),
      issuedAt,
      expiresAt,
    });

    return { sessionId: id, token, expiresAt };
  }

  async resolve(rawToken: string): Promise<ResolvedSession | null> {
    const session = await getLiveSessionByTokenHash(this.deps.db, {
      tokenHash: this.deps.tokenHasher.hash(rawToken),
      now: this.now(),
    });

    return session ? { sessionId: session.id, userId: session.userId } : null;
  }

  /** Revokes a live session; undefined when the token was unknown, expired or already revoked. */
  async revoke(rawToken: string): Promise<{ id: string; userId: string } | undefined> {
    return this.deps.sessionRepo.revokeLiveByTokenHash({
      tokenHash: this.deps.tokenHasher.hash(rawToken),
      now: this.now(),
    });
  }
}
