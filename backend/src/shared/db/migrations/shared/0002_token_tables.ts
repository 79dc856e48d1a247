import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('outstanding_tokens')
    .addColumn('jti', 'text', (col) => col.primaryKey())
    .addColumn('user_id', 'text', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('token_hash', 'text', (col) => col.notNull())
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('expires_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('outstanding_tokens_expires_at_idx')
    .on('outstanding_tokens')
    .column('expires_at')
    .execute();

  await db.schema
    .createTable('blacklisted_tokens')
    .addColumn('jti', 'text', (col) => col.primaryKey())
    .addColumn('blacklisted_at', 'text', (col) => col.notNull())
    .addColumn('expires_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema
    .createIndex('blacklisted_tokens_expires_at_idx')
    .on('blacklisted_tokens')
    .column('expires_at')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('blacklisted_tokens').ifExists().execute();
  await db.schema.dropTable('outstanding_tokens').ifExists().execute();
}
