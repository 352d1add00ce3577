/**
 * backend/src/shared/http/validation.ts
 *
 * WHY:
 * - Every controller validates input with Zod and must fail the same way:
 *   400 VALIDATION_ERROR with per-field messages (zod path joined by '.').
 *
 * RULES:
 * - HTTP-boundary helper only (services receive already-parsed input).
 */

import type { z } from 'zod';
import type { FieldErrors } from './errors';

export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};

  for (const issue of error.issues) {
    const key = issue.path.length ? issue.path.join('.') : 'non_field_errors';
    (fields[key] ??= []).push(issue.message);
  }

  return fields;
}
