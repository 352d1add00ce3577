/**
 * src/modules/settings/settings.module.ts
 *
 * WHY:
 * - Encapsulates Settings module wiring.
 * - Exposes settingsRepo so registration creates the row in its transaction.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { SettingsRepo } from './dal/settings.repo';
import { SettingsService } from './settings.service';
import { SettingsController } from './settings.controller';
import { registerSettingsRoutes } from './settings.routes';

export type SettingsModule = ReturnType<typeof createSettingsModule>;

export function createSettingsModule(deps: { db: DbExecutor; logger: Logger; now?: () => Date }) {
  const settingsRepo = new SettingsRepo(deps.db);
  const settingsService = new SettingsService({
    db: deps.db,
    logger: deps.logger,
    settingsRepo,
    now: deps.now,
  });
  const controller = new SettingsController(settingsService);

  return {
    settingsRepo,
    settingsService,
    registerRoutes(app: FastifyInstance) {
      registerSettingsRoutes(app, controller);
    },
  };
}
