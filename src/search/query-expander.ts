/**
 * Query Expander
 *
 * Produces a small set of query variants (original first) to widen
 * candidate recall. Two modes:
 * - heuristic: deterministic rewrites, no external calls
 * - model: asks a text generator for paraphrases; any failure falls back
 *   to the heuristic rewrites
 *
 * Output is deduplicated (case-insensitive) and capped at `maxVariants`,
 * which bounds the retrieval fan-out.
 */

import { silentLogger, type Logger } from '../utils/index.js';

/** Default cap on variants, original included */
export const DEFAULT_MAX_VARIANTS = 4;

const QUESTION_WORDS = ['what', 'how', 'why', 'when', 'where', 'who'];

/**
 * The slice of a generation provider the expander needs.
 */
export interface TextGenerator {
  generate(prompt: string, options?: { maxTokens?: number; signal?: AbortSignal }): Promise<string>;
}

export type ExpansionMode = 'heuristic' | 'model';

export interface QueryExpanderOptions {
  mode?: ExpansionMode;
  maxVariants?: number;
  /** Required for model mode; without it model mode behaves as heuristic */
  generator?: TextGenerator | null;
  logger?: Logger;
}

/**
 * Turn a statement into a question.
 *
 * @example
 * toQuestion('vector search')   // => 'What is vector search?'
 * toQuestion('how does BM25 work') // => 'how does BM25 work?'
 */
export function toQuestion(query: string): string {
  if (query.includes('?')) {
    return query;
  }
  const lower = query.toLowerCase();
  if (QUESTION_WORDS.some((word) => lower.startsWith(word))) {
    return `${query}?`;
  }
  return `What is ${query}?`;
}

/**
 * Deterministic variants: the query, its question form, and an
 * "explain ..." form.
 */
export function heuristicVariants(query: string): string[] {
  return [query, toQuestion(query), `explain ${query}`];
}

/**
 * Extract paraphrases from a numbered or bulleted model response.
 * Lines that look like headings ("Alternative phrasings:") are skipped.
 */
export function parseParaphrases(response: string): string[] {
  return response
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !/^alternative/i.test(line))
    .map((line) =>
      line
        .replace(/^\d+[.)]\s*/, '')
        .replace(/^[-*•]\s+/, '')
        .replace(/^"(.*)"$/, '$1')
        .trim()
    )
    .filter((line) => line.length > 0);
}

function dedupeAndCap(variants: string[], max: number): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const variant of variants) {
    const key = variant.trim().toLowerCase();
    if (key.length === 0 || seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(variant.trim());
    if (result.length >= max) {
      break;
    }
  }
  return result;
}

export class QueryExpander {
  readonly mode: ExpansionMode;
  private readonly maxVariants: number;
  private readonly generator: TextGenerator | null;
  private readonly logger: Logger;

  constructor(options: QueryExpanderOptions = {}) {
    this.mode = options.mode ?? 'heuristic';
    this.maxVariants = Math.max(1, options.maxVariants ?? DEFAULT_MAX_VARIANTS);
    this.generator = options.generator ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Variants for `query`, original first. A blank query yields [].
   */
  async expand(query: string, options: { signal?: AbortSignal } = {}): Promise<string[]> {
    if (query.trim().length === 0) {
      return [];
    }
    if (this.mode === 'model' && this.generator) {
      return this.expandWithModel(query, this.generator, options.signal);
    }
    return dedupeAndCap(heuristicVariants(query), this.maxVariants);
  }

  private async expandWithModel(
    query: string,
    generator: TextGenerator,
    signal: AbortSignal | undefined
  ): Promise<string[]> {
    const prompt = `Generate 3 alternative phrasings of this query:
Query: ${query}

Alternative phrasings:
1.`;

    let response: string;
    try {
      response = await generator.generate(prompt, { maxTokens: 200, signal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Model query expansion failed, using heuristic rewrites: ${message}`);
      return dedupeAndCap(heuristicVariants(query), this.maxVariants);
    }

    const variants = dedupeAndCap([query, ...parseParaphrases(response)], this.maxVariants);
    if (variants.length <= 1 && this.maxVariants > 1) {
      this.logger.debug?.('Model returned no usable paraphrases, using heuristic rewrites');
      return dedupeAndCap(heuristicVariants(query), this.maxVariants);
    }
    return variants;
  }
}
