/**
 * Error handling module
 *
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: ragent config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  toError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  CANCELLED_EXIT_CODE,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
