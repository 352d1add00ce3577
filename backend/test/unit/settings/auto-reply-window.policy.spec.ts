import { describe, it, expect } from 'vitest';
import {
  defaultAutoReplyWindow,
  isAutoReplyRangeValid,
} from '../../../src/modules/settings/policies/auto-reply-window.policy';

describe('isAutoReplyRangeValid', () => {
  const jan1 = new Date('2024-01-01T00:00:00.000Z');
  const jan2 = new Date('2024-01-02T00:00:00.000Z');

  it('accepts start strictly before end', () => {
    expect(isAutoReplyRangeValid({ startDate: jan1, endDate: jan2 })).toBe(true);
  });

  it('rejects start after end', () => {
    expect(isAutoReplyRangeValid({ startDate: jan2, endDate: jan1 })).toBe(false);
  });

  it('rejects start equal to end', () => {
    expect(isAutoReplyRangeValid({ startDate: jan1, endDate: new Date(jan1) })).toBe(false);
  });

  it('does not judge a range with a missing or null bound', () => {
    expect(isAutoReplyRangeValid({ startDate: jan2 })).toBe(true);
    expect(isAutoReplyRangeValid({ startDate: jan2, endDate: null })).toBe(true);
    expect(isAutoReplyRangeValid({})).toBe(true);
  });
});

describe('defaultAutoReplyWindow', () => {
  it('runs from now to now + 30 days', () => {
    const now = new Date('2024-03-01T12:00:00.000Z');

    const window = defaultAutoReplyWindow(now);

    expect(window.start.toISOString()).toBe('2024-03-01T12:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-03-31T12:00:00.000Z');
  });
});
