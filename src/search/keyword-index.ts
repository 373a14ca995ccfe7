/**
 * Keyword Index (BM25)
 *
 * Okapi BM25 over the chunk ordering of one VectorIndex snapshot, so a
 * keyword score at position i belongs to the same chunk as vector row i.
 *
 * There is no incremental update. The index records the snapshot version
 * it was built from; once the corpus changes it is stale and must be
 * rebuilt before the next hybrid search.
 */

import { silentLogger, type Logger } from '../utils/index.js';
import { IndexNotReadyError } from './errors.js';
import type { BM25Config, IndexSnapshot } from './types.js';

/** Default BM25 parameters */
export const DEFAULT_BM25_CONFIG: Required<BM25Config> = {
  k1: 1.5,
  b: 0.75,
  epsilon: 0.25,
};

/**
 * Lower-case and split on anything that is not a letter, digit or underscore.
 *
 * @example
 * tokenize("What's BM25?") // => ['what', 's', 'bm25']
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((token) => token.length > 0);
}

interface BuiltIndex {
  version: number;
  docCount: number;
  avgDocLength: number;
  docLengths: Uint32Array;
  /** term -> (position -> term frequency) */
  postings: Map<string, Map<number, number>>;
  idf: Map<string, number>;
}

export class KeywordIndex {
  private readonly config: Required<BM25Config>;
  private readonly logger: Logger;
  private built: BuiltIndex | null = null;

  constructor(config: BM25Config = {}, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_BM25_CONFIG, ...config };
    this.logger = logger;
  }

  /** Snapshot version the index was built from, or null before the first build */
  get builtVersion(): number | null {
    return this.built?.version ?? null;
  }

  /**
   * True when the index was never built or was built from another
   * snapshot version than `snapshot`.
   */
  isStale(snapshot: IndexSnapshot): boolean {
    return this.built === null || this.built.version !== snapshot.version;
  }

  /**
   * Rebuild from scratch over `snapshot.chunks`, in snapshot order.
   */
  build(snapshot: IndexSnapshot): void {
    const docCount = snapshot.chunks.length;
    const docLengths = new Uint32Array(docCount);
    const postings = new Map<string, Map<number, number>>();
    let totalLength = 0;

    snapshot.chunks.forEach((chunk, position) => {
      const tokens = tokenize(chunk.content);
      docLengths[position] = tokens.length;
      totalLength += tokens.length;

      for (const token of tokens) {
        let termPostings = postings.get(token);
        if (!termPostings) {
          termPostings = new Map();
          postings.set(token, termPostings);
        }
        termPostings.set(position, (termPostings.get(position) ?? 0) + 1);
      }
    });

    this.built = {
      version: snapshot.version,
      docCount,
      avgDocLength: docCount > 0 ? totalLength / docCount : 0,
      docLengths,
      postings,
      idf: this.computeIdf(postings, docCount),
    };
    this.logger.debug?.(`Keyword index: built ${docCount} documents, ${postings.size} terms`);
  }

  /**
   * BM25 score of `query` for every position of the built snapshot.
   * Query terms that repeat count once per occurrence.
   *
   * @throws IndexNotReadyError if build() was never called
   */
  scores(query: string): Float64Array {
    const built = this.built;
    if (!built) {
      throw new IndexNotReadyError('Keyword index');
    }

    const { k1, b } = this.config;
    const scores = new Float64Array(built.docCount);

    for (const term of tokenize(query)) {
      const termPostings = built.postings.get(term);
      const idf = built.idf.get(term);
      if (!termPostings || idf === undefined) {
        continue;
      }

      for (const [position, frequency] of termPostings) {
        const lengthRatio =
          built.avgDocLength > 0 ? (built.docLengths[position] ?? 0) / built.avgDocLength : 0;
        const denominator = frequency + k1 * (1 - b + b * lengthRatio);
        scores[position] = (scores[position] ?? 0) + (idf * (frequency * (k1 + 1))) / denominator;
      }
    }

    return scores;
  }

  /**
   * Drop the built index; the next scores() call throws until rebuilt.
   */
  reset(): void {
    this.built = null;
  }

  /**
   * IDF = ln((N - n + 0.5) / (n + 0.5)). Terms in more than half the corpus
   * get a negative value, which is floored to epsilon × mean IDF.
   */
  private computeIdf(postings: Map<string, Map<number, number>>, docCount: number): Map<string, number> {
    const idf = new Map<string, number>();
    const negative: string[] = [];
    let idfSum = 0;

    for (const [term, termPostings] of postings) {
      const docFrequency = termPostings.size;
      const value = Math.log(docCount - docFrequency + 0.5) - Math.log(docFrequency + 0.5);
      idf.set(term, value);
      idfSum += value;
      if (value < 0) {
        negative.push(term);
      }
    }

    const floor = idf.size > 0 ? this.config.epsilon * (idfSum / idf.size) : 0;
    for (const term of negative) {
      idf.set(term, floor);
    }
    return idf;
  }
}
