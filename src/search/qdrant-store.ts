/**
 * Qdrant Vector Store
 *
 * VectorStore on a Qdrant server through @qdrant/js-client-rest.
 * Each index generation gets its own collection (cosine distance).
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import type { VectorMatch, VectorPoint, VectorStore } from './types.js';

/** Points per upsert request */
const UPSERT_BATCH_SIZE = 256;

const ChunkPayloadSchema = z.object({
  text: z.string(),
  position: z.number().int().min(0),
});

export interface QdrantStoreOptions {
  /** Server URL, e.g. http://localhost:6333 */
  url: string;
  apiKey?: string;
}

export class QdrantVectorStore implements VectorStore {
  readonly name = 'qdrant';

  constructor(private readonly client: QdrantClient) {}

  static fromOptions(options: QdrantStoreOptions): QdrantVectorStore {
    return new QdrantVectorStore(new QdrantClient({ url: options.url, apiKey: options.apiKey }));
  }

  async createCollection(collectionId: string, dimensions: number): Promise<void> {
    await this.client.createCollection(collectionId, {
      vectors: { size: dimensions, distance: 'Cosine' },
    });
  }

  async upsert(collectionId: string, points: readonly VectorPoint[]): Promise<void> {
    for (let i = 0; i < points.length; i += UPSERT_BATCH_SIZE) {
      const batch = points.slice(i, i + UPSERT_BATCH_SIZE);
      await this.client.upsert(collectionId, {
        wait: true,
        points: batch.map((point) => ({
          id: point.id,
          vector: point.vector,
          payload: { text: point.payload.text, position: point.payload.position },
        })),
      });
    }
  }

  async search(
    collectionId: string,
    vector: readonly number[],
    limit: number
  ): Promise<VectorMatch[]> {
    const results = await this.client.search(collectionId, {
      vector: [...vector],
      limit,
      with_payload: true,
    });

    return results.map((result) => {
      const payload = ChunkPayloadSchema.safeParse(result.payload);
      if (!payload.success) {
        throw new Error(`Point ${String(result.id)} in ${collectionId} has no chunk payload`);
      }
      return { id: String(result.id), score: result.score, payload: payload.data };
    });
  }

  async count(collectionId: string): Promise<number> {
    const { count } = await this.client.count(collectionId, { exact: true });
    return count;
  }

  async deleteCollection(collectionId: string): Promise<void> {
    await this.client.deleteCollection(collectionId);
  }
}
