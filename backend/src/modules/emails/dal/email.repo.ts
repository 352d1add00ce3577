/**
 * backend/src/modules/emails/dal/email.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for emails and their join rows.
 *
 * RULES:
 * - No transactions started here (the send flow owns the transaction).
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { EmailFlagsPatch } from '../email.types';

export class EmailRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): EmailRepo {
    return new EmailRepo(db);
  }

  async insertEmail(params: {
    senderId: string;
    subject: string;
    body: string;
  }): Promise<{ id: string }> {
    return this.db
      .insertInto('emails')
      .values({ sender_id: params.senderId, subject: params.subject, body: params.body })
      .returning(['id'])
      .executeTakeFirstOrThrow();
  }

  async insertRecipients(emailId: string, userIds: string[]): Promise<void> {
    if (userIds.length === 0) return;

    await this.db
      .insertInto('email_recipients')
      .values(userIds.map((userId) => ({ email_id: emailId, user_id: userId })))
      .onConflict((oc) => oc.columns(['email_id', 'user_id']).doNothing())
      .execute();
  }

  async insertEmailLabels(emailId: string, labelIds: string[]): Promise<void> {
    if (labelIds.length === 0) return;

    await this.db
      .insertInto('email_labels')
      .values(labelIds.map((labelId) => ({ email_id: emailId, label_id: labelId })))
      .onConflict((oc) => oc.columns(['email_id', 'label_id']).doNothing())
      .execute();
  }

  async insertAttachments(
    emailId: string,
    attachments: Array<{ fileName: string; fileRef: string }>,
  ): Promise<void> {
    if (attachments.length === 0) return;

    await this.db
      .insertInto('attachments')
      .values(
        attachments.map((a) => ({ email_id: emailId, file_name: a.fileName, file_ref: a.fileRef })),
      )
      .execute();
  }

  /** Returns false when the email does not exist. */
  async updateFlags(emailId: string, patch: EmailFlagsPatch): Promise<boolean> {
    const res = await this.db
      .updateTable('emails')
      .set({
        ...(patch.isRead !== undefined ? { is_read: patch.isRead } : {}),
        ...(patch.isStarred !== undefined ? { is_starred: patch.isStarred } : {}),
        ...(patch.isTrashed !== undefined ? { is_trashed: patch.isTrashed } : {}),
      })
      .where('id', '=', emailId)
      .executeTakeFirst();

    return res.numUpdatedRows > 0n;
  }
}
