import { describe, it, expect } from 'vitest';
import { classifyUserIdentifier } from '../../../src/modules/users';

describe('classifyUserIdentifier', () => {
  it('treats a value with @ as an email and lowercases it', () => {
    expect(classifyUserIdentifier('  Alice@Example.COM ')).toEqual({
      kind: 'email',
      value: 'alice@example.com',
    });
  });

  it('treats anything else as a phone number, trimmed but otherwise untouched', () => {
    expect(classifyUserIdentifier(' 5551234567 ')).toEqual({ kind: 'phone', value: '5551234567' });
  });

  it('does not validate the phone format', () => {
    expect(classifyUserIdentifier('abc')).toEqual({ kind: 'phone', value: 'abc' });
  });
});
