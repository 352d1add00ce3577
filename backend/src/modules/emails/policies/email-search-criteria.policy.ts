/**
 * backend/src/modules/emails/policies/email-search-criteria.policy.ts
 *
 * WHY:
 * - The search endpoint's query string is parsed ONCE into EmailSearchCriteria;
 *   the SQL layer only ever sees typed criteria.
 *
 * RULES:
 * - q: split on whitespace and commas; every term must match (AND).
 * - start_date/end_date: both or nothing (one alone is ignored), but any
 *   supplied value must parse. A date-only value covers the whole UTC day.
 * - status: 'unread' | 'starred'; anything else is ignored.
 * - has_attachments: 'true' or '1' enables the filter; anything else is ignored.
 * - limit: 1..SEARCH_MAX_LIMIT (default SEARCH_DEFAULT_LIMIT); offset ≥ 0.
 */

import type { FieldErrors } from '../../../shared/http/errors';
import {
  DATETIME_FORMAT_MESSAGE,
  parseCalendarDate,
  parseIsoTimestamp,
} from '../../../shared/validation/dates';
import {
  SEARCH_DEFAULT_LIMIT,
  SEARCH_MAX_LIMIT,
  SEARCH_QUERY_MAX_LENGTH,
} from '../email.constants';
import type { EmailSearchCriteria, EmailStatusFilter } from '../email.types';

export type RawSearchQuery = {
  q?: string;
  start_date?: string;
  end_date?: string;
  status?: string;
  label?: string;
  has_attachments?: string;
  limit?: string;
  offset?: string;
};

export type SearchCriteriaResult =
  | { ok: true; criteria: EmailSearchCriteria }
  | { ok: false; fields: FieldErrors };

const DAY_MS = 24 * 60 * 60 * 1000;
const INTEGER = /^\d+$/;

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function splitSearchTerms(q: string): string[] {
  return q.split(/[\s,]+/).filter((t) => t.length > 0);
}

/** Date-only bounds widen to the UTC day: start → 00:00:00.000, end → 23:59:59.999. */
function parseBound(value: string, edge: 'start' | 'end'): Date | null {
  const day = parseCalendarDate(value);
  if (day) return edge === 'start' ? day : new Date(day.getTime() + DAY_MS - 1);
  return parseIsoTimestamp(value);
}

function parseStatus(value: string | null): EmailStatusFilter | null {
  return value === 'unread' || value === 'starred' ? value : null;
}

export function buildEmailSearchCriteria(raw: RawSearchQuery): SearchCriteriaResult {
  const fields: FieldErrors = {};

  const q = present(raw.q) ?? '';
  if (q.length > SEARCH_QUERY_MAX_LENGTH) {
    fields.q = [`Ensure this field has no more than ${SEARCH_QUERY_MAX_LENGTH} characters.`];
  }

  const startRaw = present(raw.start_date);
  const endRaw = present(raw.end_date);
  const start = startRaw ? parseBound(startRaw, 'start') : null;
  const end = endRaw ? parseBound(endRaw, 'end') : null;
  if (startRaw && !start) fields.start_date = [DATETIME_FORMAT_MESSAGE];
  if (endRaw && !end) fields.end_date = [DATETIME_FORMAT_MESSAGE];

  let limit = SEARCH_DEFAULT_LIMIT;
  const limitRaw = present(raw.limit);
  if (limitRaw) {
    const n = INTEGER.test(limitRaw) ? Number(limitRaw) : NaN;
    if (!(n >= 1 && n <= SEARCH_MAX_LIMIT)) {
      fields.limit = [`Must be an integer between 1 and ${SEARCH_MAX_LIMIT}.`];
    } else {
      limit = n;
    }
  }

  let offset = 0;
  const offsetRaw = present(raw.offset);
  if (offsetRaw) {
    if (!INTEGER.test(offsetRaw) || !Number.isSafeInteger(Number(offsetRaw))) {
      fields.offset = ['Must be a non-negative integer.'];
    } else {
      offset = Number(offsetRaw);
    }
  }

  if (Object.keys(fields).length > 0) return { ok: false, fields };

  const hasAttachmentsRaw = present(raw.has_attachments)?.toLowerCase();

  return {
    ok: true,
    criteria: {
      terms: splitSearchTerms(q),
      sentBetween: start && end ? { start, end } : null,
      status: parseStatus(present(raw.status)),
      label: present(raw.label),
      hasAttachments: hasAttachmentsRaw === 'true' || hasAttachmentsRaw === '1',
      limit,
      offset,
    },
  };
}
