/**
 * src/shared/db/migrations/0003_emails.ts
 *
 * WHY:
 * - emails + join tables for recipients and labels, attachments as file refs.
 * - Indexes follow the search path: sender, recipient, sent_at ordering.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('emails')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('sender_id', 'uuid', (col) =>
      col.notNull().references('users.id').onDelete('cascade'),
    )
    .addColumn('subject', 'text', (col) => col.notNull())
    .addColumn('body', 'text', (col) => col.notNull())
    .addColumn('sent_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('is_read', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_starred', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_trashed', 'boolean', (col) => col.notNull().defaultTo(false))
    .execute();

  await db.schema.createIndex('emails_sender_id_idx').on('emails').column('sender_id').execute();
  await db.schema.createIndex('emails_sent_at_idx').on('emails').column('sent_at').execute();

  await db.schema
    .createTable('email_recipients')
    .addColumn('email_id', 'uuid', (col) =>
      col.notNull().references('emails.id').onDelete('cascade'),
    )
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addPrimaryKeyConstraint('email_recipients_pk', ['email_id', 'user_id'])
    .execute();

  await db.schema
    .createIndex('email_recipients_user_id_idx')
    .on('email_recipients')
    .column('user_id')
    .execute();

  await db.schema
    .createTable('email_labels')
    .addColumn('email_id', 'uuid', (col) =>
      col.notNull().references('emails.id').onDelete('cascade'),
    )
    .addColumn('label_id', 'uuid', (col) =>
      col.notNull().references('labels.id').onDelete('cascade'),
    )
    .addPrimaryKeyConstraint('email_labels_pk', ['email_id', 'label_id'])
    .execute();

  await db.schema
    .createTable('attachments')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('email_id', 'uuid', (col) =>
      col.notNull().references('emails.id').onDelete('cascade'),
    )
    .addColumn('file_name', 'text', (col) => col.notNull())
    .addColumn('file_ref', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .execute();

  await db.schema
    .createIndex('attachments_email_id_idx')
    .on('attachments')
    .column('email_id')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('attachments').ifExists().execute();
  await db.schema.dropTable('email_labels').ifExists().execute();
  await db.schema.dropTable('email_recipients').ifExists().execute();
  await db.schema.dropTable('emails').ifExists().execute();
}
