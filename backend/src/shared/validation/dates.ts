/**
 * backend/src/shared/validation/dates.ts
 *
 * WHY:
 * - Several endpoints take dates on the wire (profile birthdate, auto-reply
 *   window, search range). They must agree on what a valid date is.
 *
 * RULES:
 * - Calendar dates are YYYY-MM-DD and must exist (2023-02-30 is rejected).
 * - Timestamps are ISO 8601 with a 'T'; without an offset they are UTC.
 * - Parsers return null instead of throwing; the HTTP layer turns that into a field error.
 */

import { z } from 'zod';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?$/i;

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

/** UTC midnight of a YYYY-MM-DD date, or null. */
export function parseCalendarDate(value: string): Date | null {
  const m = ISO_DATE.exec(value);
  if (!m) return null;

  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const d = new Date(Date.UTC(year, month - 1, day));
  const exists =
    d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;

  return exists ? d : null;
}

/** A date-only value (UTC midnight) or a full ISO 8601 timestamp, or null. */
export function parseIsoTimestamp(value: string): Date | null {
  const trimmed = value.trim();

  const dateOnly = parseCalendarDate(trimmed);
  if (dateOnly) return dateOnly;

  const m = ISO_TIMESTAMP.exec(trimmed);
  if (!m || !m[1] || !parseCalendarDate(m[1])) return null;
  if (Number(m[2]) > 23 || Number(m[3]) > 59 || Number(m[4] ?? 0) > 59) return null;

  const ms = Date.parse(m[5] ? trimmed : `${trimmed}Z`);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export const DATETIME_FORMAT_MESSAGE =
  'Datetime has wrong format. Use ISO 8601 (YYYY-MM-DD or YYYY-MM-DDThh:mm[:ss][Z|±hh:mm]).';

/** Zod schema: ISO date/timestamp string → Date. */
export const isoTimestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseIsoTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: DATETIME_FORMAT_MESSAGE });
    return z.NEVER;
  }
  return parsed;
});
