/**
 * src/modules/settings/settings.schemas.ts
 *
 * RULES:
 * - PUT bodies are partial: absent keys are left unchanged.
 * - Unknown keys are ignored (zod strips them).
 */

import { z } from 'zod';
import { isoTimestampSchema } from '../../shared/validation/dates';
import {
  AUTO_REPLY_MESSAGE_MAX_LENGTH,
  FONT_FAMILY_MAX_LENGTH,
  FONT_SIZE_MAX,
  FONT_SIZE_MIN,
} from './settings.constants';

export const updateAutoReplySchema = z.object({
  auto_reply_enabled: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }).optional(),
  auto_reply_start_date: isoTimestampSchema.nullable().optional(),
  auto_reply_end_date: isoTimestampSchema.nullable().optional(),
  auto_reply_message: z
    .string()
    .max(
      AUTO_REPLY_MESSAGE_MAX_LENGTH,
      `Ensure this field has no more than ${AUTO_REPLY_MESSAGE_MAX_LENGTH} characters.`,
    )
    .optional(),
});

export type UpdateAutoReplyInput = z.infer<typeof updateAutoReplySchema>;

export const updateFontSchema = z.object({
  font_family: z
    .string()
    .trim()
    .min(1, 'This field may not be blank.')
    .max(FONT_FAMILY_MAX_LENGTH)
    .optional(),
  font_size: z
    .number({ invalid_type_error: 'A valid integer is required.' })
    .int('A valid integer is required.')
    .min(FONT_SIZE_MIN, `Ensure this value is greater than or equal to ${FONT_SIZE_MIN}.`)
    .max(FONT_SIZE_MAX, `Ensure this value is less than or equal to ${FONT_SIZE_MAX}.`)
    .optional(),
});

export type UpdateFontInput = z.infer<typeof updateFontSchema>;

export const setDarkModeSchema = z.object({
  dark_mode: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }),
});
