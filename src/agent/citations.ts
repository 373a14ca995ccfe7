/**
 * Citation extraction
 *
 * Answers cite passages as `[chunk_id]` (several ids may share one pair of
 * brackets, comma-separated). Only ids of chunks that were actually given
 * to the model become citations; anything else in brackets is ignored.
 *
 * @example
 * ```typescript
 * extractCitations('Hybrid search fuses both [c-2, c-7].', chunks);
 * // => [{ chunkId: 'c-2', ... }, { chunkId: 'c-7', ... }]
 * ```
 */

import type { Chunk } from '../search/types.js';

const CITATION_PATTERN = /\[([^\]]+)\]/g;

export interface Citation {
  chunkId: string;
  docId: string;
  /** metadata.source, or 'Unknown' */
  source: string;
  /** metadata.filename, or 'Unknown' */
  filename: string;
  /** metadata.chunk_index, or 0 */
  chunkIndex: number;
}

/**
 * Bracketed ids in order of first appearance, without duplicates.
 */
export function extractCitationIds(text: string): string[] {
  const ids = new Set<string>();
  for (const match of text.matchAll(CITATION_PATTERN)) {
    for (const id of (match[1] ?? '').split(',')) {
      const trimmed = id.trim();
      if (trimmed) {
        ids.add(trimmed);
      }
    }
  }
  return [...ids];
}

export function toCitation(chunk: Chunk): Citation {
  const { source, filename, chunk_index: chunkIndex } = chunk.metadata;
  return {
    chunkId: chunk.chunkId,
    docId: chunk.docId,
    source: typeof source === 'string' ? source : 'Unknown',
    filename: typeof filename === 'string' ? filename : 'Unknown',
    chunkIndex: typeof chunkIndex === 'number' ? chunkIndex : 0,
  };
}

/**
 * Citations in `text` that resolve to one of `chunks`, in citation order.
 */
export function extractCitations(text: string, chunks: readonly Chunk[]): Citation[] {
  const byId = new Map(chunks.map((chunk) => [chunk.chunkId, chunk]));
  const citations: Citation[] = [];
  for (const id of extractCitationIds(text)) {
    const chunk = byId.get(id);
    if (chunk) {
      citations.push(toCitation(chunk));
    }
  }
  return citations;
}

/**
 * Numbered source list for terminal output, one citation per line:
 *
 * ```
 * [1] guide.md (c-17)
 * [2] handbook (c-4)
 * ...and 3 more
 * ```
 *
 * @param limit - Citations shown before the rest are counted (0 = all)
 */
export function formatCitations(citations: readonly Citation[], limit = 0): string {
  const shown = limit > 0 ? citations.slice(0, limit) : citations;
  const lines = shown.map((citation, i) => {
    const label =
      citation.filename !== 'Unknown'
        ? citation.filename
        : citation.source !== 'Unknown'
          ? citation.source
          : citation.docId;
    return `[${i + 1}] ${label} (${citation.chunkId})`;
  });
  if (citations.length > shown.length) {
    lines.push(`...and ${citations.length - shown.length} more`);
  }
  return lines.join('\n');
}
