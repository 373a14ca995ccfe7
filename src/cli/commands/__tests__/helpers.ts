/**
 * Shared setup for command tests: a recording CommandContext, a config
 * rooted in a temp directory, and a saved index to search.
 */

import { vi } from 'vitest';
import * as path from 'node:path';

import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import type { Config } from '../../../config/schema.js';
import { VectorIndex } from '../../../search/vector-index.js';
import type { Chunk } from '../../../search/types.js';
import type { CommandContext, GlobalOptions } from '../../types.js';

export const TEST_DIMENSIONS = 4;

export interface MockCommandContext extends CommandContext {
  logOutput: string[];
  errorOutput: string[];
  warnings: string[];
}

export function createMockCommandContext(options: Partial<GlobalOptions> = {}): MockCommandContext {
  const logOutput: string[] = [];
  const errorOutput: string[] = [];
  const warnings: string[] = [];
  return {
    options: { verbose: false, json: false, ...options },
    logOutput,
    errorOutput,
    warnings,
    log: (message: string) => logOutput.push(message),
    debug: vi.fn(),
    warn: (message: string) => warnings.push(message),
    error: (message: string) => errorOutput.push(message),
  };
}

/**
 * Defaults with 4-dimension vectors, no budget sweep timer, and the index
 * and session database under `dir`.
 */
export function createTestConfig(dir: string): Config {
  return {
    ...DEFAULT_CONFIG,
    embedding: { ...DEFAULT_CONFIG.embedding, dimensions: TEST_DIMENSIONS },
    budget: { ...DEFAULT_CONFIG.budget, sweep_interval_seconds: 0 },
    storage: {
      index_path: path.join(dir, 'index'),
      database_path: path.join(dir, 'sessions.db'),
    },
  };
}

export async function saveTestIndex(
  config: Config,
  entries: Array<{ vector: number[]; chunk: Chunk }>
): Promise<void> {
  const index = new VectorIndex({ dimensions: TEST_DIMENSIONS });
  index.add(
    entries.map((entry) => entry.vector),
    entries.map((entry) => entry.chunk)
  );
  await index.save(config.storage.index_path, 'fake-embedding');
}
