/**
 * src/modules/emails/email.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { EmailController } from './email.controller';

export function registerEmailRoutes(app: FastifyInstance, controller: EmailController) {
  app.post('/emails/send', controller.send.bind(controller));
  app.get('/emails/search', controller.search.bind(controller));
  app.patch('/emails/:emailId', controller.updateFlags.bind(controller));
}
