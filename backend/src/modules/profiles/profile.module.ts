/**
 * src/modules/profiles/profile.module.ts
 *
 * WHY:
 * - Encapsulates Profiles module wiring.
 * - Exposes profileRepo for registration (profile row) and two-factor (flag flip).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { AuditRepo } from '../../shared/audit/audit.repo';
import type { FileStore } from '../../shared/storage/file-store';
import type { UserRepo } from '../users';
import { ProfileRepo } from './dal/profile.repo';
import { ProfileService } from './profile.service';
import { ProfileController } from './profile.controller';
import { registerProfileRoutes } from './profile.routes';

export type ProfileModule = ReturnType<typeof createProfileModule>;

export function createProfileModule(deps: {
  db: DbExecutor;
  logger: Logger;
  auditRepo: AuditRepo;
  userRepo: UserRepo;
  fileStore: FileStore;
}) {
  const profileRepo = new ProfileRepo(deps.db);

  const profileService = new ProfileService({
    db: deps.db,
    logger: deps.logger,
    auditRepo: deps.auditRepo,
    userRepo: deps.userRepo,
    profileRepo,
    fileStore: deps.fileStore,
  });

  const controller = new ProfileController(profileService);

  return {
    profileRepo,
    profileService,
    registerRoutes(app: FastifyInstance) {
      registerProfileRoutes(app, controller);
    },
  };
}
