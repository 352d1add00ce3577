import { describe, it, expect } from 'vitest';
import {
  buildEmailSearchCriteria,
  splitSearchTerms,
} from '../../../src/modules/emails/policies/email-search-criteria.policy';

function criteriaOf(raw: Parameters<typeof buildEmailSearchCriteria>[0]) {
  const result = buildEmailSearchCriteria(raw);
  if (!result.ok) throw new Error(`expected ok, got ${JSON.stringify(result.fields)}`);
  return result.criteria;
}

function fieldsOf(raw: Parameters<typeof buildEmailSearchCriteria>[0]) {
  const result = buildEmailSearchCriteria(raw);
  if (result.ok) throw new Error('expected field errors');
  return result.fields;
}

describe('splitSearchTerms', () => {
  it('splits on whitespace and commas and drops empties', () => {
    expect(splitSearchTerms(' budget,  report ,,q3\tplan ')).toEqual([
      'budget',
      'report',
      'q3',
      'plan',
    ]);
  });
});

describe('buildEmailSearchCriteria', () => {
  it('defaults to no filters, limit 50, offset 0', () => {
    expect(criteriaOf({})).toEqual({
      terms: [],
      sentBetween: null,
      status: null,
      label: null,
      hasAttachments: false,
      limit: 50,
      offset: 0,
    });
  });

  it('widens date-only bounds to the whole UTC day', () => {
    const c = criteriaOf({ start_date: '2024-05-01', end_date: '2024-05-03' });

    expect(c.sentBetween?.start.toISOString()).toBe('2024-05-01T00:00:00.000Z');
    expect(c.sentBetween?.end.toISOString()).toBe('2024-05-03T23:59:59.999Z');
  });

  it('keeps full timestamps as given', () => {
    const c = criteriaOf({
      start_date: '2024-05-01T08:30:00Z',
      end_date: '2024-05-01T10:00:00+02:00',
    });

    expect(c.sentBetween?.start.toISOString()).toBe('2024-05-01T08:30:00.000Z');
    expect(c.sentBetween?.end.toISOString()).toBe('2024-05-01T08:00:00.000Z');
  });

  it('ignores a date range with only one bound', () => {
    expect(criteriaOf({ start_date: '2024-05-01' }).sentBetween).toBeNull();
    expect(criteriaOf({ end_date: '2024-05-01' }).sentBetween).toBeNull();
  });

  it('reports an unparseable date even when the other bound is missing', () => {
    expect(Object.keys(fieldsOf({ start_date: 'yesterday' }))).toEqual(['start_date']);
    expect(Object.keys(fieldsOf({ start_date: '2024-02-30', end_date: '2024-03-01' }))).toEqual([
      'start_date',
    ]);
  });

  it('accepts only unread and starred as status', () => {
    expect(criteriaOf({ status: 'unread' }).status).toBe('unread');
    expect(criteriaOf({ status: 'starred' }).status).toBe('starred');
    expect(criteriaOf({ status: 'archived' }).status).toBeNull();
  });

  it('enables has_attachments for true and 1 only', () => {
    expect(criteriaOf({ has_attachments: 'true' }).hasAttachments).toBe(true);
    expect(criteriaOf({ has_attachments: 'TRUE' }).hasAttachments).toBe(true);
    expect(criteriaOf({ has_attachments: '1' }).hasAttachments).toBe(true);
    expect(criteriaOf({ has_attachments: 'yes' }).hasAttachments).toBe(false);
    expect(criteriaOf({ has_attachments: 'false' }).hasAttachments).toBe(false);
  });

  it('keeps the label name trimmed', () => {
    expect(criteriaOf({ label: ' Work ' }).label).toBe('Work');
    expect(criteriaOf({ label: '   ' }).label).toBeNull();
  });

  it('validates limit and offset', () => {
    expect(criteriaOf({ limit: '100', offset: '20' })).toMatchObject({ limit: 100, offset: 20 });
    expect(fieldsOf({ limit: '0' })).toEqual({ limit: ['Must be an integer between 1 and 100.'] });
    expect(fieldsOf({ limit: '101' })).toEqual({ limit: ['Must be an integer between 1 and 100.'] });
    expect(fieldsOf({ limit: '2.5' })).toEqual({ limit: ['Must be an integer between 1 and 100.'] });
    expect(fieldsOf({ offset: '-1' })).toEqual({ offset: ['Must be a non-negative integer.'] });
  });
});
