/**
 * src/shared/db/migrations/0002_profiles_settings_labels.ts
 *
 * WHY:
 * - user_profiles / user_settings are one-to-one with users.
 *   UNIQUE(user_id) on user_settings is what makes get-or-create safe
 *   (INSERT ... ON CONFLICT DO NOTHING).
 * - labels are per-user tags; the three defaults are inserted at registration.
 */

import { sql, type Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('user_profiles')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('bio', 'text')
    .addColumn('birthdate', 'date')
    .addColumn('profile_picture', 'text')
    .addColumn('two_factor_enabled', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('user_profiles_user_id_unique', ['user_id'])
    .execute();

  await db.schema
    .createTable('user_settings')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('auto_reply_enabled', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('auto_reply_start_date', 'timestamptz')
    .addColumn('auto_reply_end_date', 'timestamptz')
    .addColumn('auto_reply_message', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('font_family', 'text', (col) => col.notNull().defaultTo('Arial'))
    .addColumn('font_size', 'integer', (col) => col.notNull().defaultTo(14))
    .addColumn('dark_mode', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('user_settings_user_id_unique', ['user_id'])
    .execute();

  await db.schema
    .createTable('labels')
    .addColumn('id', 'uuid', (col) => col.primaryKey().defaultTo(sql`gen_random_uuid()`))
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('color', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addUniqueConstraint('labels_user_name_unique', ['user_id', 'name'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('labels').ifExists().execute();
  await db.schema.dropTable('user_settings').ifExists().execute();
  await db.schema.dropTable('user_profiles').ifExists().execute();
}
