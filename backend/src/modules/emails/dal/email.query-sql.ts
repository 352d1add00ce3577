/**
 * backend/src/modules/emails/dal/email.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for emails, recipients, labels-on-emails and attachments.
 * - Search filters are small combinators over one ExpressionBuilder, AND-ed by
 *   the caller. Every filter is an EXISTS or a column predicate, so an email
 *   appears at most once whatever the filters.
 *
 * RULES:
 * - No AppError. No policies. No transactions started here.
 * - Visibility (sender OR recipient) is applied to every read that takes a viewer.
 * - LIKE metacharacters in user terms are escaped; terms match as substrings.
 */

import { sql } from 'kysely';
import type { Expression, ExpressionBuilder, Selectable, SqlBool } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { AttachmentsTable, DB } from '../../../shared/db/schema';
import type { EmailSearchCriteria } from '../email.types';

type EmailScope = ExpressionBuilder<DB, 'emails' | 'users'>;

export type EmailRow = {
  id: string;
  subject: string;
  body: string;
  sent_at: Date;
  is_read: boolean;
  is_starred: boolean;
  is_trashed: boolean;
  sender_id: string;
  sender_phone_number: string;
  sender_email: string;
  sender_first_name: string;
  sender_last_name: string;
};

export type RecipientRow = {
  email_id: string;
  id: string;
  phone_number: string;
  email: string;
  first_name: string;
  last_name: string;
};

export type EmailLabelNameRow = { email_id: string; name: string };

export type AttachmentRow = Selectable<AttachmentsTable>;

export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

// ── Filter combinators ─────────────────────────────────────

export function visibleTo(eb: EmailScope, userId: string): Expression<SqlBool> {
  return eb.or([
    eb('emails.sender_id', '=', userId),
    eb.exists(
      eb
        .selectFrom('email_recipients')
        .select('email_recipients.email_id')
        .whereRef('email_recipients.email_id', '=', 'emails.id')
        .where('email_recipients.user_id', '=', userId),
    ),
  ]);
}

export function matchesTerm(eb: EmailScope, term: string): Expression<SqlBool> {
  const pattern = `%${escapeLikePattern(term)}%`;
  return eb.or([
    eb('emails.subject', 'ilike', pattern),
    eb('emails.body', 'ilike', pattern),
    eb('users.phone_number', 'ilike', pattern),
  ]);
}

export function hasViewerLabel(
  eb: EmailScope,
  params: { userId: string; label: string },
): Expression<SqlBool> {
  return eb.exists(
    eb
      .selectFrom('email_labels')
      .innerJoin('labels', 'labels.id', 'email_labels.label_id')
      .select('email_labels.email_id')
      .whereRef('email_labels.email_id', '=', 'emails.id')
      .where('labels.user_id', '=', params.userId)
      .where('labels.name', '=', params.label),
  );
}

export function hasAnyAttachment(eb: EmailScope): Expression<SqlBool> {
  return eb.exists(
    eb
      .selectFrom('attachments')
      .select('attachments.id')
      .whereRef('attachments.email_id', '=', 'emails.id'),
  );
}

export function searchFilters(
  eb: EmailScope,
  params: { userId: string; criteria: EmailSearchCriteria },
): Expression<SqlBool> {
  const { userId, criteria } = params;

  const filters: Expression<SqlBool>[] = [
    visibleTo(eb, userId),
    eb('emails.is_trashed', '=', false),
  ];

  for (const term of criteria.terms) filters.push(matchesTerm(eb, term));

  if (criteria.sentBetween) {
    filters.push(eb('emails.sent_at', '>=', criteria.sentBetween.start));
    filters.push(eb('emails.sent_at', '<=', criteria.sentBetween.end));
  }

  if (criteria.status === 'unread') filters.push(eb('emails.is_read', '=', false));
  if (criteria.status === 'starred') filters.push(eb('emails.is_starred', '=', true));

  if (criteria.label !== null) filters.push(hasViewerLabel(eb, { userId, label: criteria.label }));
  if (criteria.hasAttachments) filters.push(hasAnyAttachment(eb));

  return eb.and(filters);
}

// ── Reads ──────────────────────────────────────────────────

function emailsWithSender(db: DbExecutor) {
  return db
    .selectFrom('emails')
    .innerJoin('users', 'users.id', 'emails.sender_id')
    .select([
      'emails.id',
      'emails.subject',
      'emails.body',
      'emails.sent_at',
      'emails.is_read',
      'emails.is_starred',
      'emails.is_trashed',
      'emails.sender_id',
      'users.phone_number as sender_phone_number',
      'users.email as sender_email',
      'users.first_name as sender_first_name',
      'users.last_name as sender_last_name',
    ]);
}

export async function selectEmailPageSql(
  db: DbExecutor,
  params: { userId: string; criteria: EmailSearchCriteria },
): Promise<EmailRow[]> {
  return emailsWithSender(db)
    .where((eb) => searchFilters(eb, params))
    .orderBy('emails.sent_at', 'desc')
    .orderBy('emails.id', 'desc')
    .limit(params.criteria.limit)
    .offset(params.criteria.offset)
    .execute();
}

export async function countEmailsSql(
  db: DbExecutor,
  params: { userId: string; criteria: EmailSearchCriteria },
): Promise<number> {
  const row = await db
    .selectFrom('emails')
    .innerJoin('users', 'users.id', 'emails.sender_id')
    .where((eb) => searchFilters(eb, params))
    .select(sql<number>`count(*)::int`.as('count'))
    .executeTakeFirst();

  return row?.count ?? 0;
}

/** One email the viewer sent or received (trashed included). */
export async function selectEmailForViewerSql(
  db: DbExecutor,
  params: { emailId: string; userId: string },
): Promise<EmailRow | undefined> {
  return emailsWithSender(db)
    .where('emails.id', '=', params.emailId)
    .where((eb) => visibleTo(eb, params.userId))
    .executeTakeFirst();
}

export async function selectRecipientsSql(
  db: DbExecutor,
  emailIds: string[],
): Promise<RecipientRow[]> {
  if (emailIds.length === 0) return [];

  return db
    .selectFrom('email_recipients')
    .innerJoin('users', 'users.id', 'email_recipients.user_id')
    .select([
      'email_recipients.email_id',
      'users.id',
      'users.phone_number',
      'users.email',
      'users.first_name',
      'users.last_name',
    ])
    .where('email_recipients.email_id', 'in', emailIds)
    .orderBy('users.phone_number', 'asc')
    .execute();
}

export async function selectViewerLabelNamesSql(
  db: DbExecutor,
  params: { emailIds: string[]; userId: string },
): Promise<EmailLabelNameRow[]> {
  if (params.emailIds.length === 0) return [];

  return db
    .selectFrom('email_labels')
    .innerJoin('labels', 'labels.id', 'email_labels.label_id')
    .select(['email_labels.email_id', 'labels.name'])
    .where('email_labels.email_id', 'in', params.emailIds)
    .where('labels.user_id', '=', params.userId)
    .orderBy('labels.name', 'asc')
    .execute();
}

export async function selectAttachmentsSql(
  db: DbExecutor,
  emailIds: string[],
): Promise<AttachmentRow[]> {
  if (emailIds.length === 0) return [];

  return db
    .selectFrom('attachments')
    .selectAll()
    .where('email_id', 'in', emailIds)
    .orderBy('created_at', 'asc')
    .orderBy('id', 'asc')
    .execute();
}
