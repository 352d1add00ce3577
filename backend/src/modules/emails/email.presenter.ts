/**
 * src/modules/emails/email.presenter.ts
 *
 * Email → EmailView. is_trashed is not on the wire: search never returns
 * trashed emails.
 */

import type {
  Email,
  EmailParticipant,
  EmailSearchPage,
  EmailSearchPageView,
  EmailView,
} from './email.types';
import type { UserSummaryView } from '../users';

function toParticipantView(p: EmailParticipant): UserSummaryView {
  return {
    id: p.id,
    phone_number: p.phoneNumber,
    email: p.email,
    first_name: p.firstName,
    last_name: p.lastName,
  };
}

export function toEmailView(email: Email): EmailView {
  return {
    id: email.id,
    subject: email.subject,
    body: email.body,
    sent_at: email.sentAt.toISOString(),
    is_read: email.isRead,
    is_starred: email.isStarred,
    sender: toParticipantView(email.sender),
    recipients: email.recipients.map(toParticipantView),
    labels: email.labels,
    attachments: email.attachments.map((a) => ({
      id: a.id,
      file_name: a.fileName,
      file_ref: a.fileRef,
    })),
  };
}

export function toEmailSearchPageView(page: EmailSearchPage): EmailSearchPageView {
  return {
    results: page.emails.map(toEmailView),
    count: page.count,
    limit: page.limit,
    offset: page.offset,
  };
}
