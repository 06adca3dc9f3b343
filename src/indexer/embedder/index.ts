/**
 * Embedder Module
 *
 * Usage:
 * ```typescript
 * import { createEmbeddingProvider, embedChunks } from './embedder/index.js';
 *
 * const { provider } = await createEmbeddingProvider(config.embedding);
 * const embedded = await embedChunks(chunks, provider, { batchSize: 32 });
 * ```
 */

export {
  createEmbeddingProvider,
  getModelDimensions,
  LanguageModelEmbeddingProvider,
  CachedEmbeddingProvider,
} from './provider.js';

export {
  embedChunks,
  embedQuery,
  assertDimensions,
  EmbeddingTimeoutError,
} from './embedder.js';

export type {
  EmbeddingConfig,
  EmbeddingProvider,
  EmbeddingProviderType,
  EmbeddedChunk,
  EmbedderOptions,
  ProviderOptions,
  EmbeddingProviderResult,
} from './types.js';
