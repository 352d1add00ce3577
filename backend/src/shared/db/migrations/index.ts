/**
 * src/shared/db/migrations/index.ts
 *
 * WHY:
 * - Static registry of migrations (ordered by name) for Kysely's Migrator.
 * - Shared by the CLI runner (../migrate.ts) and the test harness, so both
 *   apply exactly the same schema.
 *
 * RULES:
 * - Add every new migration file here, keyed by its file name.
 */

import type { Migration, MigrationProvider } from 'kysely';

import * as m0001 from './0001_users_sessions';
import * as m0002 from './0002_profiles_settings_labels';
import * as m0003 from './0003_emails';
import * as m0004 from './0004_two_factor_audit';

const MIGRATIONS: Record<string, Migration> = {
  '0001_users_sessions': m0001,
  '0002_profiles_settings_labels': m0002,
  '0003_emails': m0003,
  '0004_two_factor_audit': m0004,
};

export const migrationProvider: MigrationProvider = {
  getMigrations() {
    return Promise.resolve(MIGRATIONS);
  },
};
