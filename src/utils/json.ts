/**
 * JSON Utilities
 *
 * Schema-checked JSON parsing with fallback for corrupted data.
 */

import type { z } from 'zod';

/**
 * Parse a JSON string and validate it against a Zod schema, returning
 * `fallback` when the input is missing, malformed, or fails validation.
 *
 * Use this when parsing JSON from external sources (database rows, files)
 * where corruption is possible.
 *
 * @param onError - Optional callback for logging parse/validation errors
 *
 * @example
 * ```typescript
 * const metadata = safeJsonParse(row.metadata, MetadataSchema, {}, (err) => {
 *   logger.warn(`Corrupt metadata: ${err.message}`);
 * });
 * ```
 */
export function safeJsonParse<S extends z.ZodTypeAny>(
  json: string | null | undefined,
  schema: S,
  fallback: z.output<S>,
  onError?: (error: Error, rawValue: string) => void
): z.output<S> {
  if (json === null || json === undefined) {
    return fallback;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    onError?.(new Error(result.error.issues[0]?.message ?? 'Invalid JSON shape'), json);
    return fallback;
  }
  return result.data;
}
