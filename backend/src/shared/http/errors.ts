/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent: one envelope for every endpoint.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 * - `fields` is public (returned to the client); `meta` is private (logs only).
 */

export const APP_ERROR_CODES = [
  'UNAUTHENTICATED',
  'AUTHENTICATION_FAILED',
  'INVALID_CREDENTIALS',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'DUPLICATE_RESOURCE',
  'RATE_LIMITED',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

/** Field name -> messages, surfaced verbatim to the caller. */
export type FieldErrors = Record<string, string[]>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly fields?: FieldErrors;
  readonly meta?: AppErrorMeta;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    fields?: FieldErrors;
    meta?: AppErrorMeta;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.fields = opts.fields;
    this.meta = opts.meta;
  }

  static unauthenticated(message = 'Authentication credentials were not provided.') {
    return new AppError({ code: 'UNAUTHENTICATED', status: 401, message });
  }

  static authenticationFailed(message = 'Invalid or expired token', meta?: AppErrorMeta) {
    return new AppError({ code: 'AUTHENTICATION_FAILED', status: 401, message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta });
  }

  static validationError(message = 'Validation error', fields?: FieldErrors, meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, fields, meta });
  }

  static duplicateResource(message = 'Resource already exists', fields?: FieldErrors) {
    return new AppError({ code: 'DUPLICATE_RESOURCE', status: 400, message, fields });
  }

  static invalidCredentials(message = 'Invalid credentials', meta?: AppErrorMeta) {
    return new AppError({ code: 'INVALID_CREDENTIALS', status: 400, message, meta });
  }

  static rateLimited(meta?: AppErrorMeta) {
    return new AppError({ code: 'RATE_LIMITED', status: 429, message: 'Rate limited', meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta });
  }
}
