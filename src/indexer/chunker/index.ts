/**
 * Chunker Module
 *
 * ```typescript
 * import { chunkDocument } from './chunker/index.js';
 * const chunks = await chunkDocument(sessionId, text, { chunkSize: 800, chunkOverlap: 100 });
 * ```
 */

export { chunkDocument, createChunkId } from './chunker.js';
export { DEFAULT_CHUNK_SIZE, DEFAULT_CHUNK_OVERLAP } from './config.js';
export type { Chunk, ChunkOptions } from './types.js';
