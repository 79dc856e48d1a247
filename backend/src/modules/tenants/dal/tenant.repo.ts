/**
 * backend/src/modules/tenants/dal/tenant.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for companies (mutations).
 *
 * RULES:
 * - No transactions started here (directory owns tx).
 * - No AppError.
 * - No policies.
 * - Supports withDb() for transaction binding.
 * - Never deletes: companies are soft-deactivated only.
 */

import type { DbExecutor } from '../../../shared/db/db';

export class TenantRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Returns a repo bound to a different executor (e.g. a transaction).
   * This keeps the "repo instance" pattern while supporting trx usage.
   */
  withDb(db: DbExecutor): TenantRepo {
    return new TenantRepo(db);
  }

  async insertTenant(params: {
    id: string;
    name: string;
    slug: string;
    dbDescriptor: string;
    now: Date;
  }): Promise<void> {
    const at = params.now.toISOString();

    await this.db
      .insertInto('companies')
      .values({
        id: params.id,
        name: params.name,
        slug: params.slug,
        db_descriptor: params.dbDescriptor,
        is_active: 1,
        created_at: at,
        updated_at: at,
      })
      .execute();
  }

  async setActive(tenantId: string, isActive: boolean, now: Date): Promise<number> {
    const result = await this.db
      .updateTable('companies')
      .set({ is_active: isActive ? 1 : 0, updated_at: now.toISOString() })
      .where('id', '=', tenantId)
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }

  async rename(tenantId: string, name: string, now: Date): Promise<number> {
    const result = await this.db
      .updateTable('companies')
      .set({ name, updated_at: now.toISOString() })
      .where('id', '=', tenantId)
      .executeTakeFirst();

    return Number(result.numUpdatedRows);
  }
}
