/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime.
 * Provides type safety that survives beyond compile time.
 *
 * Usage:
 * ```ts
 * // Instead of:
 * const row = db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(id) as SessionRow;
 *
 * // Use:
 * const row = db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(id);
 * return row ? validateRow(SessionRowSchema, row, `sessions.session_id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

// ============================================================================
// Session Schemas
// ============================================================================

/**
 * Zod schema for rows of the `sessions` table.
 */
export const SessionRowSchema = z.object({
  session_id: z.string(),
  summary: z.string().nullable(),
  updated_at: z.string(),
});

export type SessionRow = z.infer<typeof SessionRowSchema>;

/**
 * Zod schema for rows of the `messages` table.
 *
 * `metadata` is a JSON object stored as text; it is parsed separately so a
 * corrupt value degrades to {} instead of failing the whole session.
 */
export const MessageRowSchema = z.object({
  session_id: z.string(),
  position: z.number().int().nonnegative(),
  role: z.enum(['user', 'assistant', 'system', 'tool']),
  content: z.string(),
  timestamp: z.string(),
  metadata: z.string().nullable(),
});

export type MessageRow = z.infer<typeof MessageRowSchema>;

/**
 * Row shape of the session listing query.
 */
export const SessionListingRowSchema = z.object({
  session_id: z.string(),
  updated_at: z.string(),
  message_count: z.number().int().nonnegative(),
});

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails Zod schema validation.
 *
 * This indicates schema drift - the database has data that doesn't match
 * what the code expects. Common causes:
 * - Failed migration
 * - Manual database modification
 * - Code/database version mismatch
 *
 * Exit code 5: Database error (same as DatabaseError for consistency)
 */
export class SchemaValidationError extends CLIError {
  /** Individual validation issues from Zod */
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    // Format issues for the hint
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3) // Show first 3 issues
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3
        ? `\n  ... and ${formattedIssues.length - 3} more`
        : '') +
      `\n\nThis may indicate a database/code version mismatch.\n` +
      `Try removing the session database to start fresh`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Context string for error messages (e.g., "sessions.session_id=abc")
 * @throws SchemaValidationError if validation fails
 *
 * @example
 * ```ts
 * const row = db.prepare('SELECT * FROM sessions WHERE session_id = ?').get(id);
 * if (!row) return undefined;
 * return validateRow(SessionRowSchema, row, `sessions.session_id=${id}`);
 * ```
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(
    `Database schema mismatch in ${context}`,
    result.error.issues
  );
}

/**
 * Validate an array of database rows, throwing on the first invalid one.
 *
 * @throws SchemaValidationError naming the index of the offending row
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
