import { describe, it, expect } from 'vitest';
import { isValidPhoneNumber } from '../../../src/modules/users';

describe('isValidPhoneNumber', () => {
  it.each(['0123456789', '123456789012345', '5551234567'])('accepts %s', (phone) => {
    expect(isValidPhoneNumber(phone)).toBe(true);
  });

  it.each([
    ['9 digits', '123456789'],
    ['16 digits', '1234567890123456'],
    ['empty', ''],
    ['leading plus', '+15551234567'],
    ['dashes', '555-123-4567'],
    ['letters', '555123456a'],
    ['inner space', '55512 34567'],
  ])('rejects %s', (_label, phone) => {
    expect(isValidPhoneNumber(phone)).toBe(false);
  });
});
