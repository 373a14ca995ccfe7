/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { type Logger, consoleLogger, silentLogger } from './logger.js';
export { safeJsonParse } from './json.js';
export { estimateTokens } from './tokens.js';
export { KeyedSerializer } from './keyed-queue.js';
