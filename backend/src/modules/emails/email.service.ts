/**
 * src/modules/emails/email.service.ts
 *
 * WHY:
 * - Send, search and flag updates for the caller's mailbox.
 * - Thin: sending is a flow; search criteria arrive already parsed.
 *
 * RULES:
 * - Every read is scoped to emails the caller sent or received.
 * - An email the caller cannot see is reported as not found.
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import type { EmailRepo } from './dal/email.repo';
import { getEmailForViewer, searchEmails } from './queries/email.queries';
import { executeSendEmailFlow } from './flows/send/execute-send-email-flow';
import { EmailErrors } from './email.errors';
import type {
  Email,
  EmailFlagsPatch,
  EmailSearchCriteria,
  EmailSearchPage,
  SendEmailCommand,
} from './email.types';

export class EmailService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      emailRepo: EmailRepo;
    },
  ) {}

  async send(command: SendEmailCommand, requestId: string): Promise<Email> {
    return executeSendEmailFlow(
      { db: this.deps.db, logger: this.deps.logger, emailRepo: this.deps.emailRepo },
      { command, requestId },
    );
  }

  async search(userId: string, criteria: EmailSearchCriteria): Promise<EmailSearchPage> {
    const { emails, count } = await searchEmails(this.deps.db, { userId, criteria });
    return { emails, count, limit: criteria.limit, offset: criteria.offset };
  }

  async updateFlags(params: {
    userId: string;
    emailId: string;
    patch: EmailFlagsPatch;
    requestId: string;
  }): Promise<Email> {
    const { userId, emailId } = params;

    const email = await this.deps.db.transaction().execute(async (trx) => {
      const visible = await getEmailForViewer(trx, { emailId, userId });
      if (!visible) throw EmailErrors.notFound();

      await this.deps.emailRepo.withDb(trx).updateFlags(emailId, params.patch);

      const updated = await getEmailForViewer(trx, { emailId, userId });
      if (!updated) throw EmailErrors.notFound();
      return updated;
    });

    this.deps.logger.info({
      msg: 'emails.flags.success',
      flow: 'emails.flags',
      requestId: params.requestId,
      userId,
      emailId,
    });

    return email;
  }
}
