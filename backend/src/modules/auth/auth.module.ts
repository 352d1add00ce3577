/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthServiceDeps } from './auth.service';
import { TwoFactorRepo } from './dal/two-factor.repo';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: Omit<AuthServiceDeps, 'twoFactorRepo'>) {
  const twoFactorRepo = new TwoFactorRepo(deps.db);

  const authService = new AuthService({ ...deps, twoFactorRepo });
  const controller = new AuthController(authService);

  return {
    twoFactorRepo,
    authService,
    async registerRoutes(app: FastifyInstance) {
      await registerAuthRoutes(app, controller);
    },
  };
}
