/**
 * backend/src/modules/emails/email.constants.ts
 */

export const SEARCH_DEFAULT_LIMIT = 50;
export const SEARCH_MAX_LIMIT = 100;
export const SEARCH_QUERY_MAX_LENGTH = 256;

export const MAX_RECIPIENTS = 50;
export const MAX_ATTACHMENTS = 20;
export const SUBJECT_MAX_LENGTH = 255;
export const BODY_MAX_LENGTH = 100_000;
