/**
 * Database Connection Module
 *
 * Opens SQLite connections using better-sqlite3. There is no module-level
 * singleton: the application context opens one connection and closes it
 * on shutdown, tests open ':memory:' databases.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { DatabaseError } from '../errors/index.js';
import { runMigrations } from './migrate.js';

/** better-sqlite3's in-memory database path */
export const IN_MEMORY = ':memory:';

/**
 * Open (creating if needed) the session database at `path` and bring its
 * schema up to date.
 *
 * @throws DatabaseError if the file cannot be opened or a migration fails
 *
 * @example
 * ```ts
 * const db = openDatabase(expandHome(config.storage.database_path));
 * const repository = new SqliteSessionRepository(db);
 * // ...
 * db.close();
 * ```
 */
export function openDatabase(path: string): Database.Database {
  let db: Database.Database;
  try {
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true });
    }
    db = new Database(path);
  } catch (error) {
    throw new DatabaseError(
      `Cannot open session database at ${path}`,
      error instanceof Error ? error : undefined
    );
  }

  // Enable foreign keys (OFF by default in SQLite!)
  db.pragma('foreign_keys = ON');

  // WAL for concurrent readers; not applicable to in-memory databases
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  const result = runMigrations(db);
  if (result.failed.length > 0) {
    db.close();
    const details = result.failed.map((f) => `${f.name}: ${f.error}`).join('; ');
    throw new DatabaseError(`Database migration failed (${details})`);
  }

  return db;
}
