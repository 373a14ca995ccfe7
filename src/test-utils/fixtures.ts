/**
 * Test fixtures and fakes
 */

import { vi, type Mock } from 'vitest';

import type { Chunk, ChunkMetadata, EmbeddingProvider } from '../search/types.js';
import type { GenerationProvider } from '../providers/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Build a chunk with predictable defaults.
 */
export function makeChunk(
  chunkId: string,
  content = `Content for ${chunkId}`,
  docId = 'doc-1',
  metadata: ChunkMetadata = {}
): Chunk {
  return { chunkId, docId, content, metadata };
}

/**
 * Deterministic embedder. Texts listed in `fixed` get that vector; any
 * other text gets a bag-of-words vector (each lower-cased word adds 1 to
 * bucket hash(word) % dimensions).
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly model = 'fake-embedding';
  readonly calls: string[][] = [];
  /** When set, embed() rejects with this error */
  failWith: Error | null = null;

  constructor(
    readonly dimensions: number,
    private readonly fixed: Record<string, number[]> = {}
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    if (this.failWith) {
      throw this.failWith;
    }
    return texts.map((text) => this.fixed[text] ?? this.bagOfWords(text));
  }

  private bagOfWords(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const word of text.toLowerCase().split(/\W+/).filter(Boolean)) {
      let hash = 0;
      for (const char of word) {
        hash = (hash * 31 + char.charCodeAt(0)) % 1_000_003;
      }
      const bucket = hash % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    return vector;
  }
}

export interface MockGenerationProvider extends GenerationProvider {
  generate: Mock<GenerationProvider['generate']>;
  generateStream: Mock<GenerationProvider['generateStream']>;
  generateWithTools: Mock<GenerationProvider['generateWithTools']>;
}

/**
 * Generation provider whose methods are vi.fn() mocks. Defaults: generate
 * answers "NO", generateStream yields nothing, generateWithTools returns a
 * final answer "done".
 */
export function createMockGenerationProvider(): MockGenerationProvider {
  return {
    name: 'mock',
    model: 'mock-model',
    generate: vi.fn<GenerationProvider['generate']>(async () => 'NO'),
    generateStream: vi.fn<GenerationProvider['generateStream']>(async function* () {
      // yields nothing by default
    }),
    generateWithTools: vi.fn<GenerationProvider['generateWithTools']>(async () => ({
      type: 'final_answer' as const,
      text: 'done',
    })),
  };
}

/**
 * Async iterable over fixed fragments, for generateStream mocks.
 */
export async function* streamOf(fragments: string[]): AsyncGenerator<string> {
  for (const fragment of fragments) {
    yield fragment;
  }
}

export interface RecordingLogger extends Logger {
  warnings: string[];
  debugs: string[];
}

export function createRecordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const debugs: string[] = [];
  return {
    warnings,
    debugs,
    warn: (message: string) => {
      warnings.push(message);
    },
    debug: (message: string) => {
      debugs.push(message);
    },
  };
}
