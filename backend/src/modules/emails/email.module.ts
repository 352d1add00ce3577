/**
 * src/modules/emails/email.module.ts
 *
 * WHY:
 * - Encapsulates Emails module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { EmailRepo } from './dal/email.repo';
import { EmailService } from './email.service';
import { EmailController } from './email.controller';
import { registerEmailRoutes } from './email.routes';

export type EmailModule = ReturnType<typeof createEmailModule>;

export function createEmailModule(deps: { db: DbExecutor; logger: Logger }) {
  const emailRepo = new EmailRepo(deps.db);
  const emailService = new EmailService({ db: deps.db, logger: deps.logger, emailRepo });
  const controller = new EmailController(emailService);

  return {
    emailRepo,
    emailService,
    registerRoutes(app: FastifyInstance) {
      registerEmailRoutes(app, controller);
    },
  };
}
