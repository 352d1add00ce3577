/**
 * backend/src/modules/sessions/dal/session.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for sessions.
 *
 * RULES:
 * - No AppError. No transactions started here.
 * - Liveness is decided in SQL against the caller's `now`, so the same
 *   instant drives both the lookup and any follow-up writes.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SessionsTable } from '../../../shared/db/schema';

export type SessionRow = Selectable<SessionsTable>;

export async function selectLiveSessionByTokenHashSql(
  db: DbExecutor,
  params: { tokenHash: string; now: Date },
): Promise<SessionRow | undefined> {
  return db
    .selectFrom('sessions')
    .selectAll()
    .where('token_hash', '=', params.tokenHash)
    .where('revoked_at', 'is', null)
    .where('expires_at', '>', params.now)
    .executeTakeFirst();
}

export async function selectSessionsForUserSql(
  db: DbExecutor,
  userId: string,
): Promise<SessionRow[]> {
  return db
    .selectFrom('sessions')
    .selectAll()
    .where('user_id', '=', userId)
    .orderBy('issued_at', 'asc')
    .execute();
}
