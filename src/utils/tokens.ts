/**
 * Token estimation
 *
 * Providers tokenize differently; the conversation budget only needs a
 * stable, provider-independent estimate: whitespace-separated words × 1.3.
 */

const TOKENS_PER_WORD = 1.3;

/**
 * Estimate the token count of a text. The result is fractional; sums of
 * estimates are compared against a budget without rounding.
 *
 * @example
 * estimateTokens('hello there world') // => 3.9
 */
export function estimateTokens(text: string): number {
  const words = text.split(/\s+/).filter((w) => w.length > 0).length;
  return words * TOKENS_PER_WORD;
}
