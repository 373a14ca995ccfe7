/**
 * Error type definitions for ragent
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 *
 * Module-specific errors (search, providers, agent) extend CLIError
 * from their own errors.ts files.
 */

/**
 * Base class for all ragent errors.
 *
 * - hint: tells the user HOW to fix the problem
 * - code: exit code, lets scripts branch on the failure kind
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors (bad TOML, unknown keys, bad values).
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: ragent config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing or malformed.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string, detail?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      detail ?? `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown for database-related errors. Wraps SQLite errors.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check that the session database path is writable', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Turn an unknown thrown value into an Error, keeping Error instances as-is.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
