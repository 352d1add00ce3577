/**
 * src/shared/db/migrations/0004_two_factor_audit.ts
 *
 * WHY:
 * - two_factor_codes: issued verification codes, stored as HMAC-SHA256 hashes
 *   with a short expiry; single-use via used_at.
 * - audit_events: append-only security trail (register, login, logout, 2FA).
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    CREATE TABLE two_factor_codes (
      id         UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id    UUID        NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      code_hash  TEXT        NOT NULL,
      expires_at TIMESTAMPTZ NOT NULL,
      used_at    TIMESTAMPTZ,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`CREATE INDEX two_factor_codes_user_id_idx ON two_factor_codes (user_id);`.execute(db);

  await sql`
    CREATE TABLE audit_events (
      id         UUID        PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id    UUID,
      action     TEXT        NOT NULL,
      request_id TEXT,
      ip         TEXT,
      user_agent TEXT,
      metadata   JSONB       NOT NULL DEFAULT '{}'::jsonb,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `.execute(db);

  await sql`CREATE INDEX audit_events_user_id_idx ON audit_events (user_id);`.execute(db);
  await sql`CREATE INDEX audit_events_action_idx ON audit_events (action);`.execute(db);
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await sql`DROP TABLE IF EXISTS audit_events;`.execute(db);
  await sql`DROP TABLE IF EXISTS two_factor_codes;`.execute(db);
}
