/**
 * src/modules/emails/email.schemas.ts
 *
 * RULES:
 * - Compose input is validated here; whether recipients and labels exist is
 *   the send flow's job.
 * - Query-string values arrive as strings (or arrays when repeated; the first wins).
 */

import { z } from 'zod';
import {
  BODY_MAX_LENGTH,
  MAX_ATTACHMENTS,
  MAX_RECIPIENTS,
  SUBJECT_MAX_LENGTH,
} from './email.constants';

export const sendEmailSchema = z.object({
  recipients: z
    .array(z.string().trim().min(1, 'This field may not be blank.').max(254))
    .min(1, 'At least one recipient is required.')
    .max(MAX_RECIPIENTS, `No more than ${MAX_RECIPIENTS} recipients.`),
  subject: z.string().max(SUBJECT_MAX_LENGTH).default(''),
  body: z.string().max(BODY_MAX_LENGTH).default(''),
  labels: z.array(z.string().trim().min(1).max(100)).max(20).default([]),
  attachments: z
    .array(
      z.object({
        file_name: z.string().trim().min(1).max(255),
        file_ref: z.string().trim().min(1).max(1024),
      }),
    )
    .max(MAX_ATTACHMENTS, `No more than ${MAX_ATTACHMENTS} attachments.`)
    .default([]),
});

export type SendEmailInput = z.infer<typeof sendEmailSchema>;

const queryValue = z.preprocess(
  (v) => (Array.isArray(v) ? v[0] : v),
  z.string().optional(),
);

export const searchQuerySchema = z.object({
  q: queryValue,
  start_date: queryValue,
  end_date: queryValue,
  status: queryValue,
  label: queryValue,
  has_attachments: queryValue,
  limit: queryValue,
  offset: queryValue,
});

export type SearchQueryInput = z.infer<typeof searchQuerySchema>;

export const emailParamsSchema = z.object({
  emailId: z.string().uuid(),
});

export const updateFlagsSchema = z
  .object({
    is_read: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }).optional(),
    is_starred: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }).optional(),
    is_trashed: z.boolean({ invalid_type_error: 'Must be a valid boolean.' }).optional(),
  })
  .refine(
    (v) => v.is_read !== undefined || v.is_starred !== undefined || v.is_trashed !== undefined,
    { message: 'Provide at least one of is_read, is_starred, is_trashed.' },
  );
