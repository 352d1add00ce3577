/**
 * backend/src/modules/emails/queries/email.queries.ts
 *
 * WHY:
 * - Shapes email rows plus their recipients, viewer labels and attachments
 *   into Email domain objects.
 *
 * RULES:
 * - Read-only. No AppError.
 * - Child rows are loaded in one query per kind for the whole page (no N+1).
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countEmailsSql,
  selectAttachmentsSql,
  selectEmailForViewerSql,
  selectEmailPageSql,
  selectRecipientsSql,
  selectViewerLabelNamesSql,
  type EmailRow,
} from '../dal/email.query-sql';
import type { Email, EmailAttachment, EmailParticipant, EmailSearchCriteria } from '../email.types';

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const map = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const bucket = map.get(k);
    if (bucket) bucket.push(row);
    else map.set(k, [row]);
  }
  return map;
}

async function hydrate(db: DbExecutor, rows: EmailRow[], viewerId: string): Promise<Email[]> {
  const ids = rows.map((r) => r.id);

  const [recipients, labels, attachments] = await Promise.all([
    selectRecipientsSql(db, ids),
    selectViewerLabelNamesSql(db, { emailIds: ids, userId: viewerId }),
    selectAttachmentsSql(db, ids),
  ]);

  const recipientsByEmail = groupBy(recipients, (r) => r.email_id);
  const labelsByEmail = groupBy(labels, (r) => r.email_id);
  const attachmentsByEmail = groupBy(attachments, (r) => r.email_id);

  return rows.map((row) => {
    const sender: EmailParticipant = {
      id: row.sender_id,
      phoneNumber: row.sender_phone_number,
      email: row.sender_email,
      firstName: row.sender_first_name,
      lastName: row.sender_last_name,
    };

    return {
      id: row.id,
      subject: row.subject,
      body: row.body,
      sentAt: row.sent_at,
      isRead: row.is_read,
      isStarred: row.is_starred,
      isTrashed: row.is_trashed,
      sender,
      recipients: (recipientsByEmail.get(row.id) ?? []).map(
        (r): EmailParticipant => ({
          id: r.id,
          phoneNumber: r.phone_number,
          email: r.email,
          firstName: r.first_name,
          lastName: r.last_name,
        }),
      ),
      labels: (labelsByEmail.get(row.id) ?? []).map((l) => l.name),
      attachments: (attachmentsByEmail.get(row.id) ?? []).map(
        (a): EmailAttachment => ({ id: a.id, fileName: a.file_name, fileRef: a.file_ref }),
      ),
    };
  });
}

export async function searchEmails(
  db: DbExecutor,
  params: { userId: string; criteria: EmailSearchCriteria },
): Promise<{ emails: Email[]; count: number }> {
  const [rows, count] = await Promise.all([
    selectEmailPageSql(db, params),
    countEmailsSql(db, params),
  ]);

  return { emails: await hydrate(db, rows, params.userId), count };
}

export async function getEmailForViewer(
  db: DbExecutor,
  params: { emailId: string; userId: string },
): Promise<Email | undefined> {
  const row = await selectEmailForViewerSql(db, params);
  if (!row) return undefined;

  const [email] = await hydrate(db, [row], params.userId);
  return email;
}
