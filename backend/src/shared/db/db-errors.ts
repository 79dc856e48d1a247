/**
 * backend/src/shared/db/db-errors.ts
 *
 * Driver-agnostic checks for constraint violations.
 * - Postgres (pg): SQLSTATE 23505
 * - SQLite (better-sqlite3): SQLITE_CONSTRAINT_UNIQUE / SQLITE_CONSTRAINT_PRIMARYKEY
 */

function errorCode(err: unknown): unknown {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return err.code;
}

export function isUniqueViolation(err: unknown): boolean {
  const code = errorCode(err);
  return (
    code === '23505' ||
    code === 'SQLITE_CONSTRAINT_UNIQUE' ||
    code === 'SQLITE_CONSTRAINT_PRIMARYKEY'
  );
}
