/**
 * src/modules/profiles/profile.schemas.ts
 *
 * WHY:
 * - Same validation for JSON and multipart bodies (multipart fields are
 *   collected into a plain object first).
 *
 * RULES:
 * - birthdate must be a real calendar date in YYYY-MM-DD (2023-02-30 is rejected).
 * - null clears bio/birthdate.
 */

import { z } from 'zod';
import { isCalendarDate } from '../../shared/validation/dates';

export const updateProfileSchema = z.object({
  first_name: z.string().trim().min(1, 'First name is required').max(150).optional(),
  last_name: z.string().trim().min(1, 'Last name is required').max(150).optional(),
  email: z.string().trim().email('Enter a valid email address.').max(254).optional(),
  bio: z.string().max(2000).nullable().optional(),
  birthdate: z
    .string()
    .refine(isCalendarDate, 'Date has wrong format. Use YYYY-MM-DD.')
    .nullable()
    .optional(),
});

export type UpdateProfileInput = z.infer<typeof updateProfileSchema>;
