/**
 * Embedder Types
 *
 * The embedding contract the indexer and retriever depend on, plus
 * options for the batched embedding pipeline.
 */

import type { Chunk } from '../chunker/types.js';
import type { Logger } from '../../utils/index.js';
import type { EmbeddingConfig } from '../../config/schema.js';

export type { EmbeddingConfig } from '../../config/schema.js';

export type EmbeddingProviderType = EmbeddingConfig['provider'];

/**
 * Turns text into fixed-length vectors.
 * Identical text and configuration always yield the identical vector.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  /** Length of every vector this provider returns */
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * A chunk paired with its vector, ready for upsert.
 */
export interface EmbeddedChunk {
  chunk: Chunk;
  vector: number[];
}

/**
 * Options for embedChunks().
 */
export interface EmbedderOptions {
  /**
   * Number of chunks per embedding request.
   * @default 32
   */
  batchSize?: number;

  /**
   * Timeout in milliseconds for one batch. The whole run fails when a batch
   * exceeds it.
   */
  timeout?: number;

  /**
   * Fired after each batch completes.
   * @param processed - Number of chunks embedded so far
   * @param total - Total number of chunks to embed
   */
  onProgress?: (processed: number, total: number) => void;
}

/**
 * Options for creating an embedding provider.
 */
export interface ProviderOptions {
  /**
   * Skip the Ollama reachability check.
   * @default false
   */
  skipAvailabilityCheck?: boolean;

  /**
   * Maximum number of texts kept in the embedding cache.
   * @default 1000
   */
  cacheSize?: number;

  /** Logger for provider warnings */
  logger?: Logger;
}

/**
 * Result from createEmbeddingProvider, with the metadata callers need
 * for dimension checks.
 */
export interface EmbeddingProviderResult {
  /** The provider instance, wrapped with caching */
  provider: EmbeddingProvider;
  model: string;
  dimensions: number;
}
