/**
 * backend/src/modules/users/policies/phone-number.policy.ts
 *
 * RULES:
 * - A phone number is 10 to 15 ASCII digits, nothing else (no '+', spaces or dashes).
 */

const PHONE_NUMBER = /^[0-9]{10,15}$/;

export const INVALID_PHONE_NUMBER_MESSAGE = 'Invalid phone number';

export function isValidPhoneNumber(value: string): boolean {
  return PHONE_NUMBER.test(value);
}
