/**
 * Test Utilities Module
 *
 * Shared fixtures and in-process fakes for the test suites. Nothing here
 * reaches the network; providers are vi.fn()-backed stand-ins.
 *
 * @example
 * ```typescript
 * import { makeChunk, FakeEmbeddingProvider } from '../../test-utils/index.js';
 *
 * const embedder = new FakeEmbeddingProvider(3, { 'auth flow': [1, 0, 0] });
 * ```
 */

export {
  makeChunk,
  FakeEmbeddingProvider,
  createMockGenerationProvider,
  createRecordingLogger,
  streamOf,
  type MockGenerationProvider,
  type RecordingLogger,
} from './fixtures.js';
