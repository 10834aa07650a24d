import Database from 'better-sqlite3';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export interface SqliteInitOptions {
  pragmas?: Array<{ pragma: string; value?: string | number }>;
}

export function applyPragmas(
  db: Database.Database,
  pragmas: Array<{ pragma: string; value?: string | number }> = []
): void {
  for (const entry of pragmas) {
    if (!entry.pragma) {
      continue;
    }
    if (entry.value === undefined) {
      db.pragma(entry.pragma);
    } else {
      db.pragma(`${entry.pragma} = ${entry.value}`);
    }
  }
}

function isMemoryPath(dbPath: string): boolean {
  return dbPath === ':memory:' || dbPath.startsWith('file::memory:');
}

/**
 * Opens the analytic store produced by the ETL. The file is never created or
 * written; a missing file is a startup error.
 */
export function openReadonlyDatabase(dbPath: string, options: SqliteInitOptions = {}): Database.Database {
  if (isMemoryPath(dbPath)) {
    throw new Error('an in-memory database cannot be opened read-only; construct it directly');
  }

  const absolutePath = resolve(dbPath);
  if (!existsSync(absolutePath)) {
    throw new Error(`analytic store not found at ${absolutePath}`);
  }

  const db = new Database(absolutePath, { readonly: true, fileMustExist: true });
  db.pragma('query_only = ON');

  if (options.pragmas && options.pragmas.length > 0) {
    applyPragmas(db, options.pragmas);
  }

  return db;
}
