/**
 * src/modules/settings/settings.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { SettingsController } from './settings.controller';

export function registerSettingsRoutes(app: FastifyInstance, controller: SettingsController) {
  app.get('/settings/auto-reply', controller.getAutoReply.bind(controller));
  app.put('/settings/auto-reply', controller.updateAutoReply.bind(controller));
  app.patch('/settings/auto-reply', controller.toggleAutoReply.bind(controller));

  app.get('/settings/font', controller.getFont.bind(controller));
  app.put('/settings/font', controller.updateFont.bind(controller));

  app.get('/settings/dark-mode', controller.getDarkMode.bind(controller));
  app.patch('/settings/dark-mode', controller.setDarkMode.bind(controller));
}
