/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type every query.
 * - Table shapes mirror the migrations in ./migrations (snake_case, as in SQL).
 *
 * RULES:
 * - Update this file in the same change as any migration that alters a table.
 * - DB naming (snake_case) must not leak past DAL/queries; queries map rows
 *   into camelCase domain types.
 */

import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** Timestamp with a DB default (optional on insert). */
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type JsonPrimitive = boolean | number | string | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue | undefined };
export type JsonValue = JsonArray | JsonObject | JsonPrimitive;

export interface UsersTable {
  id: Generated<string>;
  phone_number: string;
  email: string;
  first_name: string;
  last_name: string;
  password_hash: string;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface SessionsTable {
  id: Generated<string>;
  user_id: string;
  token_hash: string;
  issued_at: GeneratedTimestamp;
  expires_at: Timestamp;
  revoked_at: Timestamp | null;
}

export interface UserProfilesTable {
  id: Generated<string>;
  user_id: string;
  bio: string | null;
  // Postgres `date`; read back through to_char() as YYYY-MM-DD.
  birthdate: ColumnType<Date | null, string | null, string | null>;
  profile_picture: string | null;
  two_factor_enabled: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface UserSettingsTable {
  id: Generated<string>;
  user_id: string;
  auto_reply_enabled: Generated<boolean>;
  auto_reply_start_date: Timestamp | null;
  auto_reply_end_date: Timestamp | null;
  auto_reply_message: Generated<string>;
  font_family: Generated<string>;
  font_size: Generated<number>;
  dark_mode: Generated<boolean>;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface LabelsTable {
  id: Generated<string>;
  user_id: string;
  name: string;
  color: string;
  created_at: GeneratedTimestamp;
}

export interface EmailsTable {
  id: Generated<string>;
  sender_id: string;
  subject: string;
  body: string;
  sent_at: GeneratedTimestamp;
  is_read: Generated<boolean>;
  is_starred: Generated<boolean>;
  is_trashed: Generated<boolean>;
}

export interface EmailRecipientsTable {
  email_id: string;
  user_id: string;
}

export interface EmailLabelsTable {
  email_id: string;
  label_id: string;
}

export interface AttachmentsTable {
  id: Generated<string>;
  email_id: string;
  file_name: string;
  file_ref: string;
  created_at: GeneratedTimestamp;
}

export interface TwoFactorCodesTable {
  id: Generated<string>;
  user_id: string;
  code_hash: string;
  expires_at: Timestamp;
  used_at: Timestamp | null;
  created_at: GeneratedTimestamp;
}

export interface AuditEventsTable {
  id: Generated<string>;
  user_id: string | null;
  action: string;
  request_id: string | null;
  ip: string | null;
  user_agent: string | null;
  metadata: ColumnType<JsonValue, JsonValue | undefined, JsonValue>;
  created_at: GeneratedTimestamp;
}

export interface DB {
  users: UsersTable;
  sessions: SessionsTable;
  user_profiles: UserProfilesTable;
  user_settings: UserSettingsTable;
  labels: LabelsTable;
  emails: EmailsTable;
  email_recipients: EmailRecipientsTable;
  email_labels: EmailLabelsTable;
  attachments: AttachmentsTable;
  two_factor_codes: TwoFactorCodesTable;
  audit_events: AuditEventsTable;
}
