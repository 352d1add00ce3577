/**
 * src/modules/emails/email.controller.ts
 *
 * WHY:
 * - Maps HTTP → EmailService for send, search and flag updates.
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - Every route requires a session.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { toFieldErrors } from '../../shared/http/validation';
import type { EmailService } from './email.service';
import {
  emailParamsSchema,
  searchQuerySchema,
  sendEmailSchema,
  updateFlagsSchema,
} from './email.schemas';
import { buildEmailSearchCriteria } from './policies/email-search-criteria.policy';
import { EmailErrors } from './email.errors';
import { toEmailSearchPageView, toEmailView } from './email.presenter';

export class EmailController {
  constructor(private readonly emailService: EmailService) {}

  async send(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = sendEmailSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const email = await this.emailService.send(
      {
        senderId: session.userId,
        recipients: parsed.data.recipients,
        subject: parsed.data.subject,
        body: parsed.data.body,
        labels: parsed.data.labels,
        attachments: parsed.data.attachments.map((a) => ({
          fileName: a.file_name,
          fileRef: a.file_ref,
        })),
      },
      req.requestContext.requestId,
    );

    return reply.status(201).send(toEmailView(email));
  }

  async search(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const query = searchQuerySchema.safeParse(req.query ?? {});
    if (!query.success) {
      throw AppError.validationError('Invalid search parameters', toFieldErrors(query.error));
    }

    const criteria = buildEmailSearchCriteria(query.data);
    if (!criteria.ok) throw EmailErrors.invalidSearch(criteria.fields);

    const page = await this.emailService.search(session.userId, criteria.criteria);
    return reply.status(200).send(toEmailSearchPageView(page));
  }

  async updateFlags(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const params = emailParamsSchema.safeParse(req.params);
    if (!params.success) throw EmailErrors.notFound();

    const parsed = updateFlagsSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', toFieldErrors(parsed.error));
    }

    const email = await this.emailService.updateFlags({
      userId: session.userId,
      emailId: params.data.emailId,
      patch: {
        isRead: parsed.data.is_read,
        isStarred: parsed.data.is_starred,
        isTrashed: parsed.data.is_trashed,
      },
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(toEmailView(email));
  }
}
