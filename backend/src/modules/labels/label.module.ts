/**
 * src/modules/labels/label.module.ts
 *
 * WHY:
 * - Labels are read-only over HTTP (GET /labels); registration writes the
 *   defaults through labelRepo, and emails resolves names through the queries.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import { LabelRepo } from './dal/label.repo';
import { LabelController } from './label.controller';
import { registerLabelRoutes } from './label.routes';

export type LabelModule = ReturnType<typeof createLabelModule>;

export function createLabelModule(deps: { db: DbExecutor }) {
  const labelRepo = new LabelRepo(deps.db);
  const controller = new LabelController(deps.db);

  return {
    labelRepo,
    registerRoutes(app: FastifyInstance) {
      registerLabelRoutes(app, controller);
    },
  };
}
