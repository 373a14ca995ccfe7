/**
 * Score Fusion - weighted linear combination
 *
 * Combines vector similarity and BM25 keyword scores into one ranked list:
 *
 *   combined = α · vector + (1 - α) · keyword / max(keyword)
 *
 * - Vector scores are cosine similarities, clamped into [0, 1]
 * - Keyword scores are divided by the batch maximum (max ≤ 0 → all 0)
 * - A candidate missing from one source scores 0 for that source
 *
 * With both inputs in [0, 1] every fused score is in [0, 1].
 */

import { ValidationError } from '../errors/index.js';
import type { Chunk, ScoredChunk, VectorHit } from './types.js';

/** Default vector weight; keyword weight is 1 - alpha */
export const DEFAULT_ALPHA = 0.7;

/**
 * Fused candidate with per-source components kept for diagnostics.
 */
export interface FusedChunk extends ScoredChunk {
  /** Clamped cosine similarity (0 when absent from vector results) */
  readonly vectorScore: number;
  /** Max-normalized BM25 score (0 when the chunk has no keyword match) */
  readonly keywordScore: number;
}

export interface FuseScoresInput {
  /** Vector hits for one query, positions aligned with `chunks` */
  vectorHits: readonly VectorHit[];
  /** BM25 scores for every position of `chunks`, or null for vector-only */
  keywordScores: ArrayLike<number> | null;
  /** The snapshot's chunk list both sources were computed against */
  chunks: readonly Chunk[];
  /** Vector weight in [0, 1] (default 0.7) */
  alpha?: number;
  /** Maximum number of fused candidates to return */
  limit: number;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Fuse vector and keyword scores into one list, highest score first.
 * Equal scores keep vector rank order, then corpus order.
 *
 * @throws ValidationError if alpha is outside [0, 1]
 *
 * @example
 * ```typescript
 * const fused = fuseScores({
 *   vectorHits: index.search(queryVector, 20, snapshot),
 *   keywordScores: keywordIndex.scores(query),
 *   chunks: snapshot.chunks,
 *   limit: 20,
 * });
 * ```
 */
export function fuseScores(input: FuseScoresInput): FusedChunk[] {
  const { vectorHits, keywordScores, chunks, limit } = input;
  const alpha = input.alpha ?? DEFAULT_ALPHA;

  if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
    throw new ValidationError(`Fusion alpha must be within [0, 1], got ${alpha}`);
  }
  if (limit <= 0) {
    return [];
  }

  let maxKeyword = 0;
  if (keywordScores) {
    for (let i = 0; i < keywordScores.length; i++) {
      maxKeyword = Math.max(maxKeyword, keywordScores[i] ?? 0);
    }
  }
  const keywordAt = (position: number): number =>
    keywordScores && maxKeyword > 0 ? clampUnit((keywordScores[position] ?? 0) / maxKeyword) : 0;

  const fused: FusedChunk[] = [];
  const seen = new Set<number>();

  for (const hit of vectorHits) {
    if (seen.has(hit.position)) {
      continue;
    }
    seen.add(hit.position);
    const vectorScore = clampUnit(hit.score);
    const keywordScore = keywordAt(hit.position);
    fused.push({
      chunk: hit.chunk,
      score: alpha * vectorScore + (1 - alpha) * keywordScore,
      vectorScore,
      keywordScore,
    });
  }

  if (keywordScores && maxKeyword > 0) {
    chunks.forEach((chunk, position) => {
      if (seen.has(position)) {
        return;
      }
      const keywordScore = keywordAt(position);
      if (keywordScore > 0) {
        fused.push({ chunk, score: (1 - alpha) * keywordScore, vectorScore: 0, keywordScore });
      }
    });
  }

  // Array.prototype.sort is stable
  fused.sort((a, b) => b.score - a.score);
  return fused.slice(0, limit);
}
