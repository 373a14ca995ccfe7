/**
 * Logger Interface for Library Code
 *
 * Library code (indexes, orchestrator, agent loop) accepts a Logger via
 * dependency injection. The CLI passes its CommandContext (which satisfies
 * Logger), tests pass silentLogger or a vi.fn()-backed mock.
 */

import chalk from 'chalk';

/**
 * Generic logger interface for library code
 *
 * Designed to be compatible with CommandContext so you can pass ctx directly.
 */
export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log an informational message (optional) */
  info?: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Default console logger for use when no logger is injected.
 * Writes to stderr so stdout stays clean for --json output.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.error(chalk.yellow(`Warning: ${message}`)),
  info: (message: string) => console.error(message),
  debug: (message: string) => console.error(chalk.dim(`[debug] ${message}`)),
};

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};
