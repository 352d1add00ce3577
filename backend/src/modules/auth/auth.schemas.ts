/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 *
 * RULES:
 * - Shape only. Phone format and uniqueness are checked by the register flow,
 *   so the phone error carries its own message.
 * - Emails are lowercased in the flow, not here.
 */

import { z } from 'zod';
import { TWO_FACTOR_CODE_DIGITS } from './auth.constants';

const name = z.string().trim().min(1, 'This field may not be blank.').max(150);

export const registerSchema = z.object({
  phone_number: z.string().trim(),
  password: z
    .string()
    .min(8, 'Password must be at least 8 characters')
    .max(128, 'Password must be at most 128 characters'),
  first_name: name,
  last_name: name,
  email: z.string().trim().email('Enter a valid email address.').max(254),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  identifier: z.string().trim().min(1, 'This field may not be blank.').max(254),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

/** Logout and validate-token: the token may also come from the Authorization header. */
export const sessionTokenSchema = z.object({
  session_token: z.string().trim().max(512).optional(),
});

export const verifyTwoFactorSchema = z.object({
  verification_code: z
    .string()
    .regex(
      new RegExp(`^\\d{${TWO_FACTOR_CODE_DIGITS}}$`),
      `Code must be a ${TWO_FACTOR_CODE_DIGITS}-digit number`,
    ),
});
