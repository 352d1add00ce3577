/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - Run migrations reliably from the CLI (dev + deploy step).
 * - Migrations are registered statically in ./migrations/index.ts, so the
 *   runner needs no directory scanning or dynamic imports.
 *
 * HOW TO USE:
 * - npm run db:migrate
 */

import { createDb } from './db';
import { migrateToLatest } from './migrator';
import { buildConfig } from '../../app/config';
import { logger } from '../logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    await migrateToLatest(db);
    logger.info('migrations.up_to_date');
  } finally {
    await db.destroy();
  }
}

void main().catch((err: unknown) => {
  logger.error('migrations.failed', { err });
  process.exit(1);
});
