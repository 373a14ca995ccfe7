/**
 * Database Migration Runner
 *
 * Applies SQL migrations in order, tracking which have been applied.
 * Migrations are idempotent - safe to run multiple times.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

import { validateRows } from './validation.js';

/**
 * Result of running migrations.
 *
 * Provides explicit success/failure information instead of throwing.
 */
export interface MigrationResult {
  /** Names of migrations that were successfully applied */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// ============================================================================
// Embedded Migrations
// ============================================================================

// SQL is embedded as strings so the compiled output needs no asset files
export const MIGRATIONS: ReadonlyArray<{ name: string; sql: string }> = [
  {
    name: '001-sessions.sql',
    sql: `
-- Migration 001: Conversation sessions

CREATE TABLE IF NOT EXISTS sessions (
  session_id TEXT PRIMARY KEY,
  summary TEXT,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at);

CREATE TABLE IF NOT EXISTS messages (
  session_id TEXT NOT NULL,
  position INTEGER NOT NULL,
  role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'system', 'tool')),
  content TEXT NOT NULL,
  timestamp TEXT NOT NULL,
  metadata TEXT,                   -- JSON object
  PRIMARY KEY (session_id, position),
  FOREIGN KEY (session_id) REFERENCES sessions(session_id) ON DELETE CASCADE
);
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Apply every pending migration to `db`, each in its own transaction.
 * A failed migration is reported and the remaining ones are still tried.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  // Ensure migrations table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const alreadyApplied = new Set(
    validateRows(MigrationNameRowSchema, db.prepare('SELECT name FROM _migrations').all(), '_migrations').map(
      (row) => row.name
    )
  );

  for (const migration of MIGRATIONS) {
    if (alreadyApplied.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Names of applied migrations, in application order.
 */
export function getAppliedMigrations(db: Database.Database): string[] {
  const rows = db.prepare('SELECT name FROM _migrations ORDER BY id').all();
  return validateRows(MigrationNameRowSchema, rows, '_migrations').map((row) => row.name);
}
