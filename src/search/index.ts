/**
 * Search Module
 *
 * Vector storage, per-session index generations and retrieval.
 *
 * @example
 * ```typescript
 * import { InMemoryVectorStore, VectorIndex, Retriever } from './search/index.js';
 *
 * const vectorIndex = new VectorIndex(new InMemoryVectorStore());
 * const retriever = new Retriever(vectorIndex, embeddingProvider);
 * const context = await retriever.retrieve('What is covered?', sessionId, 4);
 * ```
 *
 * @packageDocumentation
 */

// Store adapters
export { InMemoryVectorStore, cosineSimilarity } from './memory-store.js';
export { QdrantVectorStore, type QdrantStoreOptions } from './qdrant-store.js';
export { createVectorStore } from './factory.js';

// Session index and retrieval
export { VectorIndex, collectionIdFor } from './vector-index.js';
export { Retriever } from './retriever.js';

// Types
export type {
  ChunkPayload,
  VectorPoint,
  VectorMatch,
  VectorStore,
  IndexHandle,
  RetrievedChunk,
  RetrievedContext,
} from './types.js';
