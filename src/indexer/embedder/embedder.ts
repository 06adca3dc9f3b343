/**
 * Embedder Orchestration
 *
 * Transforms Chunk[] into EmbeddedChunk[] in batches.
 *
 * A run is all-or-nothing: the first failed or timed-out batch, or the
 * first vector of the wrong length, aborts it. Indexing never publishes
 * a partially embedded document.
 */

import type { Chunk } from '../chunker/types.js';
import type { EmbeddedChunk, EmbedderOptions, EmbeddingProvider } from './types.js';
import {
  EmbeddingDimensionMismatchError,
  UpstreamCapabilityError,
} from '../../errors/index.js';

/** Default batch size - 32 is a good balance of speed vs memory */
const DEFAULT_BATCH_SIZE = 32;

/**
 * Error thrown when an embedding batch exceeds its timeout.
 */
export class EmbeddingTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(
      `Embedding operation timed out after ${timeoutMs}ms. ` +
        'The model may still be loading, or the server is overloaded. ' +
        'Consider increasing embedding.timeout_ms in ~/.skydoc/config.toml'
    );
    this.name = 'EmbeddingTimeoutError';
  }
}

/**
 * Embed a batch of texts, racing the call against a timeout when one is set.
 */
async function embedBatch(
  provider: EmbeddingProvider,
  texts: string[],
  timeout?: number
): Promise<number[][]> {
  if (!timeout) {
    return provider.embedBatch(texts);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EmbeddingTimeoutError(timeout)), timeout);
  });

  try {
    return await Promise.race([provider.embedBatch(texts), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Check a vector against the provider's declared dimensions.
 *
 * @throws EmbeddingDimensionMismatchError
 */
export function assertDimensions(vector: readonly number[] | undefined, expected: number): number[] {
  if (!vector || vector.length !== expected) {
    throw new EmbeddingDimensionMismatchError(expected, vector?.length ?? 0);
  }
  return [...vector];
}

/**
 * Embed every chunk, in order, batch by batch.
 *
 * @example
 * ```typescript
 * const embedded = await embedChunks(chunks, provider, {
 *   batchSize: 32,
 *   timeout: 60000,
 *   onProgress: (done, total) => spinner.text = `${done}/${total} chunks embedded`,
 * });
 * ```
 *
 * @throws EmbeddingDimensionMismatchError if a vector has the wrong length
 * @throws UpstreamCapabilityError (capability 'embedding') if a batch fails or times out
 */
export async function embedChunks(
  chunks: readonly Chunk[],
  provider: EmbeddingProvider,
  options: EmbedderOptions = {}
): Promise<EmbeddedChunk[]> {
  const { batchSize = DEFAULT_BATCH_SIZE, timeout, onProgress } = options;

  const embedded: EmbeddedChunk[] = [];

  for (let i = 0; i < chunks.length; i += batchSize) {
    const batch = chunks.slice(i, i + batchSize);

    let vectors: number[][];
    try {
      vectors = await embedBatch(
        provider,
        batch.map((chunk) => chunk.text),
        timeout
      );
    } catch (error) {
      throw UpstreamCapabilityError.wrap('embedding', error);
    }

    if (vectors.length !== batch.length) {
      throw new UpstreamCapabilityError(
        'embedding',
        `expected ${batch.length} vectors, got ${vectors.length}`
      );
    }

    batch.forEach((chunk, j) => {
      embedded.push({ chunk, vector: assertDimensions(vectors[j], provider.dimensions) });
    });

    onProgress?.(embedded.length, chunks.length);
  }

  return embedded;
}

/**
 * Embed a query with the same provider used for indexing.
 *
 * @throws EmbeddingDimensionMismatchError if the vector length differs from `expected`
 * @throws UpstreamCapabilityError (capability 'embedding') if the call fails
 */
export async function embedQuery(
  query: string,
  provider: EmbeddingProvider,
  expected: number = provider.dimensions
): Promise<number[]> {
  let vector: number[];
  try {
    vector = await provider.embed(query);
  } catch (error) {
    throw UpstreamCapabilityError.wrap('embedding', error);
  }
  return assertDimensions(vector, expected);
}
