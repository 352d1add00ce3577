/**
 * backend/src/modules/sessions/queries/session.queries.ts
 *
 * Read-only; shapes session rows into domain types.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  selectLiveSessionByTokenHashSql,
  selectSessionsForUserSql,
  type SessionRow,
} from '../dal/session.query-sql';
import type { Session } from '../session.types';

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    userId: row.user_id,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    revokedAt: row.revoked_at,
  };
}

export async function getLiveSessionByTokenHash(
  db: DbExecutor,
  params: { tokenHash: string; now: Date },
): Promise<Session | undefined> {
  const row = await selectLiveSessionByTokenHashSql(db, params);
  return row ? toSession(row) : undefined;
}

export async function listSessionsForUser(db: DbExecutor, userId: string): Promise<Session[]> {
  const rows = await selectSessionsForUserSql(db, userId);
  return rows.map(toSession);
}
