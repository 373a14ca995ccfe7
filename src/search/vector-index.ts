/**
 * Vector Index
 *
 * Exact nearest-neighbour store over chunk embeddings:
 * - Vectors are L2-normalized on insert and on query, so the inner
 *   product is cosine similarity
 * - Every mutation builds a new IndexSnapshot and swaps it in (copy-and-swap),
 *   so in-flight searches always see a consistent index
 * - Persists to a directory as manifest.json + chunks.json + vectors.bin
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { ValidationError, FileNotFoundError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { DimensionMismatchError } from './errors.js';
import type { Chunk, IndexSnapshot, VectorHit } from './types.js';

/** On-disk format version, bumped on incompatible layout changes */
const INDEX_FORMAT_VERSION = 1;

const MANIFEST_FILE = 'manifest.json';
const CHUNKS_FILE = 'chunks.json';
const VECTORS_FILE = 'vectors.bin';

/**
 * Zod schema for a chunk as stored in chunks.json and corpus files.
 */
export const ChunkSchema = z.object({
  chunkId: z.string().min(1),
  docId: z.string().min(1),
  content: z.string(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
});

const ManifestSchema = z.object({
  formatVersion: z.literal(INDEX_FORMAT_VERSION),
  dimensions: z.number().int().positive(),
  count: z.number().int().nonnegative(),
  model: z.string().optional(),
  savedAt: z.string(),
});

export type IndexManifest = z.infer<typeof ManifestSchema>;

export interface VectorIndexOptions {
  /** Vector length every added embedding must have */
  dimensions: number;
  logger?: Logger;
}

/**
 * L2-normalize `source` into `target` at `offset`. Zero vectors stay zero.
 */
function writeNormalized(source: ArrayLike<number>, target: Float32Array, offset: number): void {
  let sumSquares = 0;
  for (let i = 0; i < source.length; i++) {
    const value = source[i] ?? 0;
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  for (let i = 0; i < source.length; i++) {
    const value = source[i] ?? 0;
    target[offset + i] = norm > 0 ? value / norm : 0;
  }
}

function assertFinite(vector: ArrayLike<number>, label: string): void {
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) {
      throw new ValidationError(`${label} contains a non-finite value at position ${i}`);
    }
  }
}

function emptySnapshot(dimensions: number, version: number): IndexSnapshot {
  return {
    version,
    dimensions,
    chunks: [],
    vectors: new Float32Array(0),
    positions: new Map(),
  };
}

/**
 * In-memory vector index with snapshot isolation.
 *
 * @example
 * ```typescript
 * const index = new VectorIndex({ dimensions: 1536 });
 * index.add(embeddings, chunks);
 * const hits = index.search(queryEmbedding, 5);
 * ```
 */
export class VectorIndex {
  readonly dimensions: number;
  private current: IndexSnapshot;
  private readonly logger: Logger;

  /** In-flight load, shared by concurrent load() calls */
  private loading: Promise<IndexManifest> | null = null;

  constructor(options: VectorIndexOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new ValidationError(`Index dimensions must be a positive integer, got ${options.dimensions}`);
    }
    this.dimensions = options.dimensions;
    this.logger = options.logger ?? silentLogger;
    this.current = emptySnapshot(options.dimensions, 0);
  }

  /** Number of chunks in the current snapshot */
  get size(): number {
    return this.current.chunks.length;
  }

  /** Version of the current snapshot; changes on every mutation */
  get version(): number {
    return this.current.version;
  }

  /**
   * The current snapshot. Hold on to it to run several reads (vector
   * search, keyword scoring) against the same corpus.
   */
  snapshot(): IndexSnapshot {
    return this.current;
  }

  /**
   * Add chunks with their embeddings.
   *
   * @throws DimensionMismatchError if counts differ or a vector has the wrong length
   * @throws ValidationError on duplicate chunk ids or non-finite values
   */
  add(vectors: ReadonlyArray<ArrayLike<number>>, chunks: readonly Chunk[]): void {
    if (vectors.length !== chunks.length) {
      throw new DimensionMismatchError(
        `Expected ${chunks.length} vectors for ${chunks.length} chunks, got ${vectors.length}`,
        chunks.length,
        vectors.length
      );
    }
    if (chunks.length === 0) {
      return;
    }

    const base = this.current;
    const positions = new Map(base.positions);
    const dims = this.dimensions;

    chunks.forEach((chunk, i) => {
      const vector = vectors[i] ?? [];
      if (vector.length !== dims) {
        throw new DimensionMismatchError(
          `Vector for chunk "${chunk.chunkId}" has ${vector.length} dimensions, index expects ${dims}`,
          dims,
          vector.length
        );
      }
      assertFinite(vector, `Vector for chunk "${chunk.chunkId}"`);
      if (positions.has(chunk.chunkId)) {
        throw new ValidationError(`Duplicate chunk id: ${chunk.chunkId}`);
      }
      positions.set(chunk.chunkId, base.chunks.length + i);
    });

    const merged = new Float32Array((base.chunks.length + chunks.length) * dims);
    merged.set(base.vectors);
    vectors.forEach((vector, i) => {
      writeNormalized(vector, merged, (base.chunks.length + i) * dims);
    });

    this.current = {
      version: base.version + 1,
      dimensions: dims,
      chunks: [...base.chunks, ...chunks],
      vectors: merged,
      positions,
    };
    this.logger.debug?.(`Vector index: added ${chunks.length} chunks (total ${this.current.chunks.length})`);
  }

  /**
   * Exact top-k search by cosine similarity.
   *
   * Returns min(k, size) hits, highest score first; equal scores keep
   * insertion order.
   *
   * @param snapshot - Snapshot to search (default: the current one)
   */
  search(queryVector: ArrayLike<number>, k: number, snapshot: IndexSnapshot = this.current): VectorHit[] {
    if (queryVector.length !== snapshot.dimensions) {
      throw new DimensionMismatchError(
        `Query vector has ${queryVector.length} dimensions, index expects ${snapshot.dimensions}`,
        snapshot.dimensions,
        queryVector.length
      );
    }
    assertFinite(queryVector, 'Query vector');

    const count = snapshot.chunks.length;
    const limit = Math.min(Math.max(0, Math.floor(k)), count);
    if (limit === 0) {
      return [];
    }

    const dims = snapshot.dimensions;
    const query = new Float32Array(dims);
    writeNormalized(queryVector, query, 0);

    const scores = new Float64Array(count);
    for (let row = 0; row < count; row++) {
      let dot = 0;
      const offset = row * dims;
      for (let d = 0; d < dims; d++) {
        dot += (query[d] ?? 0) * (snapshot.vectors[offset + d] ?? 0);
      }
      scores[row] = dot;
    }

    const order = Array.from({ length: count }, (_, row) => row);
    order.sort((a, b) => (scores[b] ?? 0) - (scores[a] ?? 0) || a - b);

    const hits: VectorHit[] = [];
    for (const position of order.slice(0, limit)) {
      const chunk = snapshot.chunks[position];
      if (chunk) {
        hits.push({ chunk, score: scores[position] ?? 0, position });
      }
    }
    return hits;
  }

  /**
   * O(1) lookup by chunk id.
   */
  getById(chunkId: string): Chunk | undefined {
    const position = this.current.positions.get(chunkId);
    return position === undefined ? undefined : this.current.chunks[position];
  }

  /**
   * Drop every chunk. Readers holding the previous snapshot are unaffected.
   */
  clear(): void {
    this.current = emptySnapshot(this.dimensions, this.current.version + 1);
  }

  /**
   * Write the current snapshot to `dir`.
   *
   * Files are written to temporaries and renamed, so a crash mid-save
   * leaves the previous copy intact.
   */
  async save(dir: string, model?: string): Promise<IndexManifest> {
    const snapshot = this.current;
    await mkdir(dir, { recursive: true });

    const manifest: IndexManifest = {
      formatVersion: INDEX_FORMAT_VERSION,
      dimensions: snapshot.dimensions,
      count: snapshot.chunks.length,
      model,
      savedAt: new Date().toISOString(),
    };
    const chunks = snapshot.chunks.map(({ chunkId, docId, content, metadata }) => ({
      chunkId,
      docId,
      content,
      metadata,
    }));
    const bytes = Buffer.from(
      snapshot.vectors.buffer,
      snapshot.vectors.byteOffset,
      snapshot.vectors.byteLength
    );

    await writeAtomic(join(dir, VECTORS_FILE), bytes);
    await writeAtomic(join(dir, CHUNKS_FILE), JSON.stringify(chunks));
    // Manifest last: its presence marks a complete save
    await writeAtomic(join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));

    this.logger.debug?.(`Vector index: saved ${manifest.count} chunks to ${dir}`);
    return manifest;
  }

  /**
   * Replace the index contents with a saved copy.
   *
   * The new snapshot is swapped in only after every file was read and
   * validated. Concurrent calls share one in-flight load.
   *
   * @throws FileNotFoundError if `dir` holds no saved index
   * @throws DimensionMismatchError if the saved dimension differs
   * @throws ValidationError if the files are inconsistent
   */
  load(dir: string): Promise<IndexManifest> {
    if (this.loading) {
      return this.loading;
    }

    const loading = this.readSnapshot(dir).finally(() => {
      this.loading = null;
    });
    this.loading = loading;
    return loading;
  }

  private async readSnapshot(dir: string): Promise<IndexManifest> {
    const manifestPath = join(dir, MANIFEST_FILE);
    if (!existsSync(manifestPath)) {
      throw new FileNotFoundError(manifestPath);
    }

    const manifest = parseJsonFile(await readFile(manifestPath, 'utf-8'), ManifestSchema, manifestPath);
    if (manifest.dimensions !== this.dimensions) {
      throw new DimensionMismatchError(
        `Saved index has ${manifest.dimensions} dimensions, expected ${this.dimensions}`,
        this.dimensions,
        manifest.dimensions
      );
    }

    const chunksPath = join(dir, CHUNKS_FILE);
    const chunks = parseJsonFile(await readFile(chunksPath, 'utf-8'), z.array(ChunkSchema), chunksPath);
    const bytes = await readFile(join(dir, VECTORS_FILE));

    const expectedBytes = manifest.count * manifest.dimensions * Float32Array.BYTES_PER_ELEMENT;
    if (chunks.length !== manifest.count || bytes.byteLength !== expectedBytes) {
      throw new ValidationError(`Saved index in ${dir} is inconsistent`, [
        `manifest count: ${manifest.count}`,
        `chunks.json entries: ${chunks.length}`,
        `vectors.bin bytes: ${bytes.byteLength} (expected ${expectedBytes})`,
      ]);
    }

    // Copy into an aligned buffer; readFile gives no alignment guarantee
    const vectors = new Float32Array(manifest.count * manifest.dimensions);
    new Uint8Array(vectors.buffer).set(bytes);

    const positions = new Map<string, number>();
    chunks.forEach((chunk, position) => {
      if (positions.has(chunk.chunkId)) {
        throw new ValidationError(`Duplicate chunk id in saved index: ${chunk.chunkId}`);
      }
      positions.set(chunk.chunkId, position);
    });

    this.current = {
      version: this.current.version + 1,
      dimensions: manifest.dimensions,
      chunks,
      vectors,
      positions,
    };
    this.logger.debug?.(`Vector index: loaded ${chunks.length} chunks from ${dir}`);
    return manifest;
  }
}

async function writeAtomic(path: string, data: string | Buffer): Promise<void> {
  const tmp = `${path}.tmp`;
  await writeFile(tmp, data);
  await rename(tmp, path);
}

function parseJsonFile<S extends z.ZodTypeAny>(text: string, schema: S, path: string): z.output<S> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Corrupt index file ${path}: ${message}`);
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Corrupt index file ${path}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
