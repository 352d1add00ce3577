/**
 * backend/src/modules/sessions/dal/session.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for sessions.
 *
 * RULES:
 * - No transactions started here. No AppError.
 * - Revocation is ONE conditional UPDATE: concurrent logouts cannot
 *   resurrect or double-revoke a session.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class SessionRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): SessionRepo {
    return new SessionRepo(db);
  }

  async insertSession(params: {
    userId: string;
    tokenHash: string;
    issuedAt: Date;
    expiresAt: Date;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('sessions')
      .values({
        user_id: params.userId,
        token_hash: params.tokenHash,
        issued_at: params.issuedAt,
        expires_at: params.expiresAt,
      })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  /**
   * Revokes the live session with this token hash.
   * Returns the revoked session (id + user) or undefined when nothing was live.
   */
  async revokeLiveByTokenHash(params: {
    tokenHash: string;
    now: Date;
  }): Promise<{ id: string; userId: string } | undefined> {
    const row = await this.db
      .updateTable('sessions')
      .set({ revoked_at: params.now })
      .where('token_hash', '=', params.tokenHash)
      .where('revoked_at', 'is', null)
      .where('expires_at', '>', params.now)
      .returning(['id', 'user_id'])
      .executeTakeFirst();

    return row ? { id: row.id, userId: row.user_id } : undefined;
  }
}
