/**
 * Error formatting and process exit handling for the ragent CLI.
 *
 * Every failure is reduced to a `ReportedError` first, so the text and
 * JSON renderings agree on message, exit code and hint. Provider and
 * database errors carry the SDK/driver error as `cause`; it is shown with
 * --verbose. Cancellation (Ctrl+C during `index` or `ask`) exits 130 and
 * prints no "Error:" prefix.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';

/** Exit code for a run the user cancelled (128 + SIGINT) */
export const CANCELLED_EXIT_CODE = 130;

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show stack traces and underlying causes */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output. `type` is the error class name
 * (`ProviderError`, `BudgetExceededError`, ...) for scripts that branch
 * on more than the exit code.
 */
export interface ErrorOutput {
  error: string;
  code: number;
  type?: string;
  hint?: string;
  cause?: string;
  stack?: string;
}

interface ReportedError {
  message: string;
  code: number;
  type?: string;
  hint?: string;
  cause?: Error;
  stack?: string;
}

function isCancellation(error: Error): boolean {
  return error.name === 'AbortError' || error.name === 'APIUserAbortError';
}

function report(error: unknown, verbose: boolean): ReportedError {
  if (error instanceof CLIError) {
    return {
      message: error.message,
      code: error.code,
      type: error.name,
      hint: error.hint,
      cause: error.cause instanceof Error ? error.cause : undefined,
      stack: error.stack,
    };
  }
  if (error instanceof Error) {
    if (isCancellation(error)) {
      return { message: 'Cancelled', code: CANCELLED_EXIT_CODE, type: error.name };
    }
    return {
      message: error.message,
      code: 1,
      type: error.name,
      hint: verbose ? undefined : 'Run with --verbose for more details',
      stack: error.stack,
    };
  }
  return { message: String(error), code: 1 };
}

/**
 * Format an error for display. Kept apart from handleError so it can be
 * tested without process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const reported = report(error, verbose);

  if (json) {
    const output: ErrorOutput = {
      error: reported.message,
      code: reported.code,
      type: reported.type,
      hint: reported.hint,
      cause: verbose ? reported.cause?.message : undefined,
      stack: verbose ? reported.stack : undefined,
    };
    return JSON.stringify(output, null, 2);
  }

  const lines = [
    reported.code === CANCELLED_EXIT_CODE
      ? chalk.yellow(reported.message)
      : chalk.red('Error: ') + reported.message,
  ];
  if (reported.hint) {
    lines.push(chalk.dim('Hint: ') + reported.hint);
  }
  if (verbose && reported.cause) {
    lines.push(chalk.dim('Caused by: ') + reported.cause.message);
  }
  if (verbose && reported.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(reported.stack));
  }
  return lines.join('\n');
}

/**
 * Get the exit code for an error: the CLIError's own code, 130 for an
 * aborted call, 1 for everything else.
 */
export function getExitCode(error: unknown): number {
  return report(error, false).code;
}

/**
 * Handle an error by formatting it to stderr and exiting with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level `uncaughtException` and
 * `unhandledRejection` events. Options are captured at setup time.
 */
export function createGlobalErrorHandler(options: ErrorHandlerOptions = {}): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
