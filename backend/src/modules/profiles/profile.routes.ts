/**
 * src/modules/profiles/profile.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { ProfileController } from './profile.controller';

export function registerProfileRoutes(app: FastifyInstance, controller: ProfileController) {
  app.get('/profile', controller.get.bind(controller));
  app.put('/profile', controller.update.bind(controller));
  app.delete('/profile', controller.remove.bind(controller));
}
