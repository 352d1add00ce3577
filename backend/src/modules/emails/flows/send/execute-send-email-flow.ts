/**
 * backend/src/modules/emails/flows/send/execute-send-email-flow.ts
 *
 * WHY:
 * - Composing an email touches four tables; they are written together or not at all.
 *
 * RULES:
 * - Recipients are phone numbers or email addresses of registered users.
 *   Duplicates collapse (the same user named twice gets one recipient row).
 * - Labels are the SENDER's labels, by exact name.
 * - Every unknown recipient/label is reported before anything is written.
 * - Logs carry ids and counts only (never addresses or phone numbers).
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { Logger } from '../../../../shared/logger/logger';
import { AppError } from '../../../../shared/http/errors';

import {
  classifyUserIdentifier,
  getUsersByPhonesOrEmails,
  type User,
  type UserIdentifier,
} from '../../../users';
import { getLabelsByNames } from '../../../labels';

import type { EmailRepo } from '../../dal/email.repo';
import { getEmailForViewer } from '../../queries/email.queries';
import { EmailErrors } from '../../email.errors';
import type { Email, SendEmailCommand } from '../../email.types';

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

function matches(user: User, identifier: UserIdentifier): boolean {
  return identifier.kind === 'email'
    ? user.email === identifier.value
    : user.phoneNumber === identifier.value;
}

async function resolveRecipientIds(db: DbExecutor, identifiers: string[]): Promise<string[]> {
  const classified = unique(identifiers).map((raw) => ({
    raw,
    identifier: classifyUserIdentifier(raw),
  }));

  const users = await getUsersByPhonesOrEmails(db, {
    phoneNumbers: classified.filter((c) => c.identifier.kind === 'phone').map((c) => c.identifier.value),
    emails: classified.filter((c) => c.identifier.kind === 'email').map((c) => c.identifier.value),
  });

  const ids: string[] = [];
  const unknown: string[] = [];

  for (const c of classified) {
    const user = users.find((u) => matches(u, c.identifier));
    if (user) ids.push(user.id);
    else unknown.push(c.raw);
  }

  if (unknown.length > 0) throw EmailErrors.unknownRecipients(unknown);
  return unique(ids);
}

async function resolveLabelIds(
  db: DbExecutor,
  params: { userId: string; names: string[] },
): Promise<string[]> {
  const names = unique(params.names);
  if (names.length === 0) return [];

  const labels = await getLabelsByNames(db, { userId: params.userId, names });
  const unknown = names.filter((name) => !labels.some((l) => l.name === name));
  if (unknown.length > 0) throw EmailErrors.unknownLabels(unknown);

  return labels.map((l) => l.id);
}

export async function executeSendEmailFlow(
  deps: {
    db: DbExecutor;
    logger: Logger;
    emailRepo: EmailRepo;
  },
  params: { command: SendEmailCommand; requestId: string },
): Promise<Email> {
  const { command } = params;

  deps.logger.info({
    msg: 'emails.send.start',
    flow: 'emails.send',
    requestId: params.requestId,
    userId: command.senderId,
  });

  const recipientIds = await resolveRecipientIds(deps.db, command.recipients);
  const labelIds = await resolveLabelIds(deps.db, {
    userId: command.senderId,
    names: command.labels,
  });

  const email = await deps.db.transaction().execute(async (trx) => {
    const emailRepo = deps.emailRepo.withDb(trx);

    const { id } = await emailRepo.insertEmail({
      senderId: command.senderId,
      subject: command.subject,
      body: command.body,
    });

    await emailRepo.insertRecipients(id, recipientIds);
    await emailRepo.insertEmailLabels(id, labelIds);
    await emailRepo.insertAttachments(id, command.attachments);

    const created = await getEmailForViewer(trx, { emailId: id, userId: command.senderId });
    if (!created) throw AppError.internal('Sent email not readable', { emailId: id });
    return created;
  });

  deps.logger.info({
    msg: 'emails.send.success',
    flow: 'emails.send',
    requestId: params.requestId,
    userId: command.senderId,
    emailId: email.id,
    recipientCount: recipientIds.length,
    attachmentCount: command.attachments.length,
  });

  return email;
}
