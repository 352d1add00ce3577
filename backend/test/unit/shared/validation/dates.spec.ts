import { describe, it, expect } from 'vitest';
import {
  isCalendarDate,
  isoTimestampSchema,
  parseCalendarDate,
  parseIsoTimestamp,
  DATETIME_FORMAT_MESSAGE,
} from '../../../../src/shared/validation/dates';

describe('parseCalendarDate', () => {
  it('returns UTC midnight for a real date', () => {
    expect(parseCalendarDate('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('rejects dates that do not exist', () => {
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
    expect(parseCalendarDate('2024-04-31')).toBeNull();
  });

  it('rejects other shapes', () => {
    expect(isCalendarDate('2024-1-05')).toBe(false);
    expect(isCalendarDate('05/01/2024')).toBe(false);
    expect(isCalendarDate('2024-01-05T00:00:00Z')).toBe(false);
  });
});

describe('parseIsoTimestamp', () => {
  it('reads a timestamp without an offset as UTC', () => {
    expect(parseIsoTimestamp('2024-06-01T09:15')?.toISOString()).toBe('2024-06-01T09:15:00.000Z');
  });

  it('applies an explicit offset', () => {
    expect(parseIsoTimestamp('2024-06-01T09:15:30-03:00')?.toISOString()).toBe(
      '2024-06-01T12:15:30.000Z',
    );
  });

  it('accepts a bare date', () => {
    expect(parseIsoTimestamp(' 2024-06-01 ')?.toISOString()).toBe('2024-06-01T00:00:00.000Z');
  });

  it('rejects out-of-range clock values and impossible dates', () => {
    expect(parseIsoTimestamp('2024-06-01T24:00')).toBeNull();
    expect(parseIsoTimestamp('2024-06-01T10:60')).toBeNull();
    expect(parseIsoTimestamp('2023-02-29T10:00Z')).toBeNull();
    expect(parseIsoTimestamp('not a date')).toBeNull();
  });
});

describe('isoTimestampSchema', () => {
  it('transforms to a Date', () => {
    const parsed = isoTimestampSchema.safeParse('2024-06-01T00:00:00Z');
    expect(parsed.success && parsed.data.toISOString()).toBe('2024-06-01T00:00:00.000Z');
  });

  it('reports the format message', () => {
    const parsed = isoTimestampSchema.safeParse('tomorrow');
    expect(parsed.success).toBe(false);
    expect(parsed.error?.issues.map((i) => i.message)).toEqual([DATETIME_FORMAT_MESSAGE]);
  });
});
