/**
 * Database Module
 *
 * SQLite storage for conversation sessions.
 *
 * @example
 * ```ts
 * import { openDatabase, SqliteSessionRepository } from './database/index.js';
 *
 * const db = openDatabase(':memory:');
 * const repository = new SqliteSessionRepository(db);
 * repository.save({ sessionId: 'abc', summary: null, messages: [], updatedAt: new Date().toISOString() });
 * ```
 */

// Connection management
export { openDatabase, IN_MEMORY } from './connection.js';

// Migrations
export { runMigrations, getAppliedMigrations, MIGRATIONS } from './migrate.js';
export type { MigrationResult } from './migrate.js';

// Repositories
export { SqliteSessionRepository } from './session-repository.js';

// Row validation
export {
  SessionRowSchema,
  MessageRowSchema,
  SessionListingRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';
export type { SessionRow, MessageRow } from './validation.js';
