/**
 * backend/src/modules/users/policies/user-identifier.policy.ts
 *
 * WHY:
 * - Login and compose both accept "phone number or email" in one field.
 *
 * RULES:
 * - Anything containing '@' is an email (compared lowercase).
 * - Everything else is a phone number, compared exactly after trimming.
 */

export type UserIdentifier =
  | { kind: 'email'; value: string }
  | { kind: 'phone'; value: string };

export function classifyUserIdentifier(raw: string): UserIdentifier {
  const value = raw.trim();
  return value.includes('@')
    ? { kind: 'email', value: value.toLowerCase() }
    : { kind: 'phone', value };
}
