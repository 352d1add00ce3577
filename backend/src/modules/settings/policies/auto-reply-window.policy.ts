/**
 * backend/src/modules/settings/policies/auto-reply-window.policy.ts
 *
 * WHY:
 * - Pure rules for the auto-reply window, unit-tested without a DB.
 *
 * RULES:
 * - The range check only applies when BOTH bounds arrive in the same request
 *   (non-null); a single bound is stored as given.
 * - start must be strictly before end.
 * - Switching on without dates opens [now, now + AUTO_REPLY_DEFAULT_WINDOW_DAYS).
 */

import { AUTO_REPLY_DEFAULT_WINDOW_DAYS } from '../settings.constants';

const DAY_MS = 24 * 60 * 60 * 1000;

export function isAutoReplyRangeValid(input: {
  startDate?: Date | null;
  endDate?: Date | null;
}): boolean {
  if (!input.startDate || !input.endDate) return true;
  return input.startDate.getTime() < input.endDate.getTime();
}

export function defaultAutoReplyWindow(now: Date): { start: Date; end: Date } {
  return {
    start: now,
    end: new Date(now.getTime() + AUTO_REPLY_DEFAULT_WINDOW_DAYS * DAY_MS),
  };
}
