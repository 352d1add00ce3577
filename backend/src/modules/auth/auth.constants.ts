/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perIdentifier: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 10, windowSeconds: 900 },
  },
  register: {
    perPhone: { limit: 5, windowSeconds: 3600 },
    perIp: { limit: 5, windowSeconds: 3600 },
  },
  twoFactorIssue: {
    perUser: { limit: 5, windowSeconds: 900 },
  },
  twoFactorVerify: {
    perUser: { limit: 5, windowSeconds: 900 }, // hard 429
  },
} as const;

export const TWO_FACTOR_CODE_DIGITS = 6;

export const LOGOUT_MESSAGE = 'Successfully logged out.';
export const TOKEN_VALID_MESSAGE = 'Token is valid';
export const TWO_FACTOR_CODE_SENT_MESSAGE = 'Verification code sent';
export const TWO_FACTOR_ENABLED_MESSAGE = 'Two-factor authentication enabled';
