/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Login failures never reveal whether a phone number or email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, codes or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import { INVALID_PHONE_NUMBER_MESSAGE } from '../users';

const PHONE_TAKEN = 'Phone number already registered.';
const EMAIL_TAKEN = 'Email already registered.';
const INVALID_CODE = 'Invalid verification code';

export const AuthErrors = {
  invalidPhoneNumber() {
    return AppError.validationError(INVALID_PHONE_NUMBER_MESSAGE, {
      phone_number: [INVALID_PHONE_NUMBER_MESSAGE],
    });
  },

  phoneTaken() {
    return AppError.duplicateResource(PHONE_TAKEN, { phone_number: [PHONE_TAKEN] });
  },

  emailTaken() {
    return AppError.duplicateResource(EMAIL_TAKEN, { email: [EMAIL_TAKEN] });
  },

  /** Login: unknown identifier or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.invalidCredentials('Invalid phone number/email or password.', meta);
  },

  /** Missing, unknown, expired or revoked session token. */
  tokenInvalid() {
    return AppError.authenticationFailed();
  },

  profileNotFound() {
    return AppError.notFound('Profile not found.');
  },

  /**
   * Wrong, expired or already used code. One message for all three so the
   * response is not an oracle for which codes were issued.
   */
  invalidVerificationCode(meta?: AppErrorMeta) {
    return AppError.validationError(INVALID_CODE, { verification_code: [INVALID_CODE] }, meta);
  },
} as const;
