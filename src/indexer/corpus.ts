/**
 * Corpus Reader
 *
 * A corpus is a JSONL file: one chunk per line,
 *
 *   {"chunkId":"guide-3","docId":"guide","content":"...","metadata":{"filename":"guide.md"}}
 *
 * with an optional precomputed `embedding` array. Blank lines are
 * skipped. Every bad line is reported at once, by line number.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { FileNotFoundError, ValidationError } from '../errors/index.js';
import { ChunkSchema } from '../search/vector-index.js';
import type { Chunk } from '../search/types.js';

/** Issues listed in a ValidationError before the rest are summarized */
const MAX_REPORTED_ISSUES = 10;

export const CorpusRecordSchema = ChunkSchema.extend({
  embedding: z.array(z.number()).optional(),
});

export type CorpusRecord = z.infer<typeof CorpusRecordSchema>;

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Parse JSONL text into corpus records.
 *
 * @param source - Name used in the error message (usually the file path)
 * @throws ValidationError listing every malformed, invalid or duplicate line
 */
export function parseCorpus(text: string, source = 'corpus'): CorpusRecord[] {
  const records: CorpusRecord[] = [];
  const issues: string[] = [];
  const firstSeen = new Map<string, number>();

  text.split(/\r?\n/).forEach((line, i) => {
    const lineNumber = i + 1;
    if (line.trim().length === 0) {
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      issues.push(`line ${lineNumber}: not valid JSON`);
      return;
    }

    const parsed = CorpusRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      issues.push(`line ${lineNumber}: ${issue ? describeIssue(issue) : 'invalid chunk'}`);
      return;
    }

    const { chunkId } = parsed.data;
    const earlier = firstSeen.get(chunkId);
    if (earlier !== undefined) {
      issues.push(`line ${lineNumber}: duplicate chunkId "${chunkId}" (first seen on line ${earlier})`);
      return;
    }
    firstSeen.set(chunkId, lineNumber);
    records.push(parsed.data);
  });

  if (issues.length > 0) {
    const reported = issues.slice(0, MAX_REPORTED_ISSUES);
    if (issues.length > MAX_REPORTED_ISSUES) {
      reported.push(`... and ${issues.length - MAX_REPORTED_ISSUES} more`);
    }
    throw new ValidationError(`Invalid corpus ${source}: ${issues.length} bad line(s)`, reported);
  }
  return records;
}

/**
 * Read and parse a corpus file.
 *
 * @throws FileNotFoundError if `path` does not exist
 * @throws ValidationError if any line is invalid
 */
export async function readCorpus(path: string): Promise<CorpusRecord[]> {
  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }
  return parseCorpus(await readFile(path, 'utf-8'), path);
}

/** The chunk part of a record, without its embedding */
export function toChunk(record: CorpusRecord): Chunk {
  return {
    chunkId: record.chunkId,
    docId: record.docId,
    content: record.content,
    metadata: record.metadata,
  };
}
