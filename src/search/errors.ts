/**
 * Search Module Errors
 *
 * Custom error classes for index and retrieval failures.
 * All errors extend CLIError for consistent error handling.
 */

import { CLIError } from '../errors/index.js';

/**
 * Thrown when vectors don't line up with chunks or with the index dimension.
 *
 * Exit code 6: Index validation error
 *
 * @example
 * ```typescript
 * index.add([[0.1, 0.2]], [chunkA, chunkB]);
 * // DimensionMismatchError: Expected 2 vectors for 2 chunks, got 1
 * ```
 */
export class DimensionMismatchError extends CLIError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(
      message,
      'Re-embed the chunks with the model the index was built with, or clear the index first',
      6
    );
    this.name = 'DimensionMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when a keyword search runs before the index was built.
 *
 * Exit code 7: Index not ready
 */
export class IndexNotReadyError extends CLIError {
  constructor(indexName: string) {
    super(
      `${indexName} has not been built yet`,
      'Index a corpus first: ragent index <corpus.jsonl>',
      7
    );
    this.name = 'IndexNotReadyError';
  }
}
