/**
 * Corpus Reader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { parseCorpus, readCorpus, toChunk } from '../corpus.js';
import { FileNotFoundError, ValidationError } from '../../errors/index.js';

function line(value: unknown): string {
  return JSON.stringify(value);
}

describe('parseCorpus', () => {
  it('parses one chunk per line and skips blank lines', () => {
    const text = [
      line({ chunkId: 'c1', docId: 'guide', content: 'Install the CLI', metadata: { filename: 'guide.md' } }),
      '',
      line({ chunkId: 'c2', docId: 'guide', content: 'Run the indexer' }),
      '',
    ].join('\n');

    const records = parseCorpus(text);

    expect(records).toEqual([
      { chunkId: 'c1', docId: 'guide', content: 'Install the CLI', metadata: { filename: 'guide.md' } },
      { chunkId: 'c2', docId: 'guide', content: 'Run the indexer', metadata: {} },
    ]);
  });

  it('accepts CRLF line endings', () => {
    const text = `${line({ chunkId: 'a', docId: 'd', content: 'x' })}\r\n${line({ chunkId: 'b', docId: 'd', content: 'y' })}\r\n`;

    expect(parseCorpus(text).map((record) => record.chunkId)).toEqual(['a', 'b']);
  });

  it('keeps a precomputed embedding', () => {
    const [record] = parseCorpus(line({ chunkId: 'a', docId: 'd', content: 'x', embedding: [0.5, 0.5] }));

    expect(record?.embedding).toEqual([0.5, 0.5]);
    expect(record && toChunk(record)).toEqual({ chunkId: 'a', docId: 'd', content: 'x', metadata: {} });
  });

  it('reports every bad line by number', () => {
    const text = [
      'not json',
      line({ docId: 'd', content: 'x' }),
      line({ chunkId: 'a', docId: 'd', content: 'x' }),
      line({ chunkId: 'a', docId: 'd', content: 'y' }),
    ].join('\n');

    let caught: unknown;
    try {
      parseCorpus(text, 'test.jsonl');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toBe('Invalid corpus test.jsonl: 3 bad line(s)');
      expect(caught.issues).toEqual([
        'line 1: not valid JSON',
        'line 2: chunkId: Required',
        'line 4: duplicate chunkId "a" (first seen on line 3)',
      ]);
    }
  });

  it('summarizes issues past the first ten', () => {
    const text = Array.from({ length: 12 }, () => '{').join('\n');

    let caught: unknown;
    try {
      parseCorpus(text);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.issues).toHaveLength(11);
      expect(caught.issues[10]).toBe('... and 2 more');
    }
  });
});

describe('readCorpus', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ragent-corpus-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads a corpus file', async () => {
    const file = path.join(tempDir, 'corpus.jsonl');
    fs.writeFileSync(file, line({ chunkId: 'a', docId: 'd', content: 'x' }));

    await expect(readCorpus(file)).resolves.toHaveLength(1);
  });

  it('throws FileNotFoundError for a missing file', async () => {
    await expect(readCorpus(path.join(tempDir, 'missing.jsonl'))).rejects.toThrow(FileNotFoundError);
  });
});
