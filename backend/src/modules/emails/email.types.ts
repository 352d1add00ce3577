/**
 * backend/src/modules/emails/email.types.ts
 *
 * WHY:
 * - Domain and wire types for composing, searching and flagging mail
 *   between registered users.
 *
 * RULES:
 * - An email is visible to its sender and its recipients only.
 * - Flags (read, starred, trashed) live on the email itself.
 * - Labels shown on an email are always the viewer's own labels.
 */

import type { UserSummaryView } from '../users';

export type EmailParticipant = {
  id: string;
  phoneNumber: string;
  email: string;
  firstName: string;
  lastName: string;
};

export type EmailAttachment = {
  id: string;
  fileName: string;
  fileRef: string;
};

export type Email = {
  id: string;
  subject: string;
  body: string;
  sentAt: Date;
  isRead: boolean;
  isStarred: boolean;
  isTrashed: boolean;
  sender: EmailParticipant;
  recipients: EmailParticipant[];
  /** Names of the viewer's labels attached to this email. */
  labels: string[];
  attachments: EmailAttachment[];
};

export type EmailStatusFilter = 'unread' | 'starred';

/** Search parameters, parsed once from the query string. */
export type EmailSearchCriteria = {
  terms: string[];
  sentBetween: { start: Date; end: Date } | null;
  status: EmailStatusFilter | null;
  label: string | null;
  hasAttachments: boolean;
  limit: number;
  offset: number;
};

export type EmailSearchPage = {
  emails: Email[];
  count: number;
  limit: number;
  offset: number;
};

export type SendEmailCommand = {
  senderId: string;
  recipients: string[];
  subject: string;
  body: string;
  labels: string[];
  attachments: Array<{ fileName: string; fileRef: string }>;
};

export type EmailFlagsPatch = {
  isRead?: boolean;
  isStarred?: boolean;
  isTrashed?: boolean;
};

// ── Wire views ─────────────────────────────────────────────

export type EmailAttachmentView = {
  id: string;
  file_name: string;
  file_ref: string;
};

export type EmailView = {
  id: string;
  subject: string;
  body: string;
  sent_at: string;
  is_read: boolean;
  is_starred: boolean;
  sender: UserSummaryView;
  recipients: UserSummaryView[];
  labels: string[];
  attachments: EmailAttachmentView[];
};

export type EmailSearchPageView = {
  results: EmailView[];
  count: number;
  limit: number;
  offset: number;
};
