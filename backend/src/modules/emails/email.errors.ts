/**
 * src/modules/emails/email.errors.ts
 *
 * Emails module error semantics (AppError is the transport).
 */

import { AppError, type FieldErrors } from '../../shared/http/errors';

export const EmailErrors = {
  /** Also used for ids that are not UUIDs and emails the caller cannot see. */
  notFound() {
    return AppError.notFound('Email not found.');
  },

  unknownRecipients(identifiers: string[]) {
    const messages = identifiers.map((id) => `Unknown recipient: ${id}`);
    return AppError.validationError(messages[0] ?? 'Unknown recipient', {
      recipients: messages,
    });
  },

  unknownLabels(names: string[]) {
    const messages = names.map((name) => `Unknown label: ${name}`);
    return AppError.validationError(messages[0] ?? 'Unknown label', { labels: messages });
  },

  invalidSearch(fields: FieldErrors) {
    return AppError.validationError('Invalid search parameters', fields);
  },
} as const;
