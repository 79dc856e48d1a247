import type { Kysely } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable('products')
    .addColumn('id', 'text', (col) => col.primaryKey())
    .addColumn('name', 'text', (col) => col.notNull())
    .addColumn('slug', 'text', (col) => col.notNull().unique())
    .addColumn('description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('price', 'text', (col) => col.notNull())
    .addColumn('cost_price', 'text')
    .addColumn('sku', 'text', (col) => col.unique())
    .addColumn('quantity', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('status', 'text', (col) => col.notNull().defaultTo('draft'))
    .addColumn('is_featured', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('meta_title', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('meta_description', 'text', (col) => col.notNull().defaultTo(''))
    .addColumn('created_by', 'text')
    .addColumn('updated_by', 'text')
    .addColumn('created_at', 'text', (col) => col.notNull())
    .addColumn('updated_at', 'text', (col) => col.notNull())
    .execute();

  await db.schema.createIndex('products_status_idx').on('products').column('status').execute();
  await db.schema
    .createIndex('products_created_at_idx')
    .on('products')
    .column('created_at')
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable('products').ifExists().execute();
}
