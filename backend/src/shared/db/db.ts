/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection.
 * - Table types live in ./schema.ts, next to the migrations that define them.
 *
 * HOW TO USE:
 * - Apply migrations first:
 *     npm run db:migrate
 * - createDb() is called once by the composition root (app/di.ts).
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { DB } from './schema';

export type Db = Kysely<DB>;

/**
 * DbExecutor is the only DB "capability" DAL/queries should accept.
 * - Works for both the main DB and transactions (flows pass `trx`).
 * - Prevents leaking concrete DB construction into modules.
 */
export type DbExecutor = Kysely<DB>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}

const UNIQUE_VIOLATION = '23505';

/**
 * Postgres unique-violation check (SQLSTATE 23505), optionally narrowed to a
 * constraint name. Used by find-or-create paths that race on a unique index.
 */
export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  if (!err || typeof err !== 'object') return false;
  if (!('code' in err) || err.code !== UNIQUE_VIOLATION) return false;
  if (!constraint) return true;
  return 'constraint' in err && err.constraint === constraint;
}
