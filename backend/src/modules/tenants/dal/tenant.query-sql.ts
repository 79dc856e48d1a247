import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CompaniesTable } from '../../../shared/db/shared-db.types';

/**
 * DAL READS ONLY (shared database: companies)
 * - No AppError
 * - No policies
 * - No transactions started here
 */
export type TenantRow = Selectable<CompaniesTable>;

export async function selectTenantByIdSql(
  db: DbExecutor,
  tenantId: string,
): Promise<TenantRow | undefined> {
  return db.selectFrom('companies').selectAll().where('id', '=', tenantId).executeTakeFirst();
}

export async function selectTenantBySlugSql(
  db: DbExecutor,
  slug: string,
): Promise<TenantRow | undefined> {
  return db.selectFrom('companies').selectAll().where('slug', '=', slug).executeTakeFirst();
}

export async function isDescriptorTakenSql(db: DbExecutor, descriptor: string): Promise<boolean> {
  const row = await db
    .selectFrom('companies')
    .select('id')
    .where('db_descriptor', '=', descriptor)
    .executeTakeFirst();

  return row !== undefined;
}

export async function selectTenantsSql(
  db: DbExecutor,
  opts: { activeOnly: boolean },
): Promise<TenantRow[]> {
  let query = db.selectFrom('companies').selectAll();
  if (opts.activeOnly) query = query.where('is_active', '=', 1);
  return query.orderBy('name').orderBy('created_at').execute();
}
