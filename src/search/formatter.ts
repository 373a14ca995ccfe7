/**
 * Search Result Formatter
 *
 * Utilities for formatting retrieved chunks for CLI display and JSON output.
 *
 * @example
 * ```typescript
 * import { formatResult, formatResultJSON } from './formatter.js';
 *
 * // Human-readable format
 * const text = formatResult(result);
 * // [0.92] guide.md#3 (chunk-17)
 * //   Hybrid search combines dense vectors with keyword scores...
 *
 * // JSON format
 * const json = formatResultJSON(result);
 * // { score: 0.92, chunkId: "chunk-17", docId: "guide", ... }
 * ```
 *
 * @packageDocumentation
 */

import type { Chunk, ScoredChunk } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

export interface FormatOptions {
  /** Maximum snippet length (default: 200) */
  snippetLength?: number;
  /** Prefix each result with its score (default: true) */
  showScore?: boolean;
}

/**
 * JSON shape of one result, flattened for jq and scripts.
 */
export interface FormattedResultJSON {
  score: number;
  chunkId: string;
  docId: string;
  source: string;
  content: string;
  metadata: Chunk['metadata'];
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Truncate content to a maximum length with ellipsis.
 * Newlines and runs of whitespace collapse to single spaces.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)      // "Hello..."
 * truncateSnippet("Line 1\nLine 2", 20)  // "Line 1 Line 2"
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

/**
 * Human-readable origin of a chunk: its filename (or source, or docId),
 * with "#index" when the chunk index is known.
 */
export function describeSource(chunk: Chunk): string {
  const { filename, source, chunk_index: chunkIndex } = chunk.metadata;
  const base =
    typeof filename === 'string' ? filename : typeof source === 'string' ? source : chunk.docId;
  return typeof chunkIndex === 'number' ? `${base}#${chunkIndex}` : base;
}

// ============================================================================
// Text Formatting
// ============================================================================

/**
 * Format a single result for text display.
 *
 * ```
 * [0.92] guide.md#3 (chunk-17)
 *   Hybrid search combines dense vectors with keyword scores...
 * ```
 */
export function formatResult(result: ScoredChunk, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.score)}]`);
  }
  parts.push(`${describeSource(result.chunk)} (${result.chunk.chunkId})`);

  return `${parts.join(' ')}\n${SNIPPET_INDENT}${truncateSnippet(result.chunk.content, snippetLength)}`;
}

/**
 * Format results separated by blank lines. Empty input gives ''.
 */
export function formatResults(results: readonly ScoredChunk[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

// ============================================================================
// JSON Formatting
// ============================================================================

export function formatResultJSON(result: ScoredChunk): FormattedResultJSON {
  return {
    score: result.score,
    chunkId: result.chunk.chunkId,
    docId: result.chunk.docId,
    source: describeSource(result.chunk),
    content: result.chunk.content,
    metadata: result.chunk.metadata,
  };
}

export function formatResultsJSON(results: readonly ScoredChunk[]): FormattedResultJSON[] {
  return results.map(formatResultJSON);
}
