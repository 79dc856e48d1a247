/**
 * backend/src/shared/db/sqlite.ts
 *
 * WHY:
 * - One place that opens better-sqlite3 handles with the same pragmas
 *   (shared DB in dev/tests, every tenant DB always).
 *
 * RULES:
 * - fileMustExist=true for tenant connections: opening a missing tenant file
 *   must fail instead of silently creating an empty, unprovisioned database.
 */

import { mkdirSync } from 'node:fs';
import path from 'node:path';
import SQLite from 'better-sqlite3';
import type { Database } from 'better-sqlite3';

export const IN_MEMORY = ':memory:';

export function openSqlite(filename: string, opts: { fileMustExist?: boolean } = {}): Database {
  const inMemory = filename === IN_MEMORY;

  if (!inMemory && !opts.fileMustExist) {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const database = new SQLite(filename, { fileMustExist: opts.fileMustExist ?? false });

  database.pragma('foreign_keys = ON');
  if (!inMemory) {
    database.pragma('journal_mode = WAL');
    database.pragma('busy_timeout = 5000');
  }

  return database;
}
