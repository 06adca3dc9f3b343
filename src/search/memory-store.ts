/**
 * In-Memory Vector Store
 *
 * Brute-force cosine search over Maps. Default backend for the CLI
 * (indexes live for one process) and for tests.
 */

import type { VectorMatch, VectorPoint, VectorStore } from './types.js';

interface Collection {
  dimensions: number;
  points: Map<string, VectorPoint>;
}

/**
 * Cosine similarity of two equal-length vectors (0 when either is all zeros).
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryVectorStore implements VectorStore {
  readonly name = 'memory';
  private readonly collections = new Map<string, Collection>();

  async createCollection(collectionId: string, dimensions: number): Promise<void> {
    if (this.collections.has(collectionId)) {
      throw new Error(`Collection already exists: ${collectionId}`);
    }
    this.collections.set(collectionId, { dimensions, points: new Map() });
  }

  async upsert(collectionId: string, points: readonly VectorPoint[]): Promise<void> {
    const collection = this.getCollection(collectionId);
    for (const point of points) {
      if (point.vector.length !== collection.dimensions) {
        throw new Error(
          `Vector dimension error: expected dim: ${collection.dimensions}, got ${point.vector.length}`
        );
      }
      collection.points.set(point.id, {
        id: point.id,
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async search(
    collectionId: string,
    vector: readonly number[],
    limit: number
  ): Promise<VectorMatch[]> {
    const collection = this.getCollection(collectionId);
    const matches: VectorMatch[] = [];
    for (const point of collection.points.values()) {
      matches.push({
        id: point.id,
        score: cosineSimilarity(vector, point.vector),
        payload: { ...point.payload },
      });
    }
    return matches.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async count(collectionId: string): Promise<number> {
    return this.getCollection(collectionId).points.size;
  }

  async deleteCollection(collectionId: string): Promise<void> {
    this.collections.delete(collectionId);
  }

  /** Ids of live collections */
  listCollections(): string[] {
    return [...this.collections.keys()];
  }

  private getCollection(collectionId: string): Collection {
    const collection = this.collections.get(collectionId);
    if (!collection) {
      throw new Error(`Collection not found: ${collectionId}`);
    }
    return collection;
  }
}
