/**
 * src/modules/labels/label.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { LabelController } from './label.controller';

export function registerLabelRoutes(app: FastifyInstance, controller: LabelController) {
  app.get('/labels', controller.list.bind(controller));
}
