/**
 * src/modules/profiles/profile.errors.ts
 *
 * Profile module error semantics (AppError is the transport).
 */

import { AppError } from '../../shared/http/errors';

const EMAIL_TAKEN = 'Email already registered.';

export const ProfileErrors = {
  notFound() {
    return AppError.notFound('Profile not found.');
  },

  emailTaken() {
    return AppError.duplicateResource(EMAIL_TAKEN, { email: [EMAIL_TAKEN] });
  },

  unsupportedPicture(mimetype: string) {
    return AppError.validationError(
      'Profile picture must be a PNG, JPEG, GIF or WebP image.',
      { profile_picture: ['Unsupported image type.'] },
      { mimetype },
    );
  },

  unexpectedFile(fieldname: string) {
    return AppError.validationError('Unexpected file field.', {
      [fieldname]: ['Only profile_picture accepts a file.'],
    });
  },
} as const;
