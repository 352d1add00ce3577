/**
 * src/modules/labels/label.controller.ts
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import { requireSession } from '../../shared/http/require-auth-context';
import { listLabelsForUser } from './queries/label.queries';
import type { LabelView } from './label.types';

export class LabelController {
  constructor(private readonly db: DbExecutor) {}

  async list(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const labels = await listLabelsForUser(this.db, session.userId);
    const views: LabelView[] = labels.map((l) => ({ id: l.id, name: l.name, color: l.color }));

    return reply.status(200).send({ labels: views });
  }
}
