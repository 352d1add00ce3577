/**
 * backend/src/shared/db/migrator.ts
 *
 * WHY:
 * - One function that applies all pending migrations.
 * - Shared by the CLI runner (./migrate.ts) and the test harness.
 */

import { Migrator } from 'kysely';

import type { Db } from './db';
import { migrationProvider } from './migrations';
import { logger } from '../logger/logger';

/** Applies all pending migrations. Throws on the first failing migration. */
export async function migrateToLatest(db: Db): Promise<void> {
  const migrator = new Migrator({ db, provider: migrationProvider });

  const { error, results } = await migrator.migrateToLatest();

  results?.forEach((r) => {
    if (r.status === 'Success') logger.info('migration.success', { migration: r.migrationName });
    if (r.status === 'Error') logger.error('migration.error', { migration: r.migrationName });
  });

  if (error) throw error;
}
