/**
 * Search Module Types
 *
 * The vector-store contract, index handles and retrieval results.
 */

import type { Chunk } from '../indexer/chunker/types.js';

/**
 * What is stored next to every vector.
 */
export interface ChunkPayload {
  text: string;
  position: number;
}

export interface VectorPoint {
  /** Chunk id (UUID-shaped) */
  id: string;
  vector: number[];
  payload: ChunkPayload;
}

export interface VectorMatch {
  id: string;
  /** Cosine similarity; higher is more relevant */
  score: number;
  payload: ChunkPayload;
}

/**
 * The operations the pipeline needs from a vector database.
 * Collections are created per index generation and never reused.
 */
export interface VectorStore {
  readonly name: string;
  createCollection(collectionId: string, dimensions: number): Promise<void>;
  upsert(collectionId: string, points: readonly VectorPoint[]): Promise<void>;
  /** Up to `limit` matches, best first */
  search(collectionId: string, vector: readonly number[], limit: number): Promise<VectorMatch[]>;
  count(collectionId: string): Promise<number>;
  deleteCollection(collectionId: string): Promise<void>;
}

/**
 * One published generation of a session's document index.
 * Replaced as a whole on re-index, never merged.
 */
export interface IndexHandle {
  readonly sessionId: string;
  readonly collectionId: string;
  readonly generation: number;
  readonly chunkCount: number;
  readonly dimensions: number;
  readonly createdAt: Date;
}

export interface RetrievedChunk {
  chunk: Chunk;
  score: number;
}

/**
 * Retrieved chunks, best first, at most k long.
 */
export type RetrievedContext = RetrievedChunk[];
