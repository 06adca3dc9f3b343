/**
 * Retriever
 *
 * Embeds a query with the provider used for indexing and returns the
 * session's best-matching chunks.
 */

import { ValidationError } from '../errors/index.js';
import { embedQuery } from '../indexer/embedder/embedder.js';
import type { EmbeddingProvider } from '../indexer/embedder/types.js';
import type { Chunk } from '../indexer/chunker/types.js';
import type { RetrievedContext } from './types.js';
import type { VectorIndex } from './vector-index.js';

/**
 * @example
 * ```typescript
 * const retriever = new Retriever(vectorIndex, embeddingProvider);
 * const context = await retriever.retrieve('What does section 2 cover?', 'session-1', 4);
 * for (const { chunk, score } of context) {
 *   console.log(`[${chunk.position}] ${score.toFixed(3)} ${chunk.text.slice(0, 60)}`);
 * }
 * ```
 */
export class Retriever {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly embeddingProvider: EmbeddingProvider
  ) {}

  /**
   * At most `k` chunks, sorted by descending score (ties by position).
   *
   * @throws ValidationError if k is not a positive integer
   * @throws NoIndexError if the session has no index
   * @throws EmbeddingDimensionMismatchError if the query vector does not fit the index
   */
  async retrieve(query: string, sessionId: string, k: number): Promise<RetrievedContext> {
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError('Invalid top-k value', [`k must be a positive integer, got ${k}`]);
    }

    return this.vectorIndex.withHandle(sessionId, async (handle) => {
      const vector = await embedQuery(query, this.embeddingProvider, handle.dimensions);
      const matches = await this.vectorIndex.search(handle, vector, k);

      return matches
        .map((match) => {
          const chunk: Chunk = Object.freeze({
            id: match.id,
            text: match.payload.text,
            position: match.payload.position,
          });
          return { chunk, score: match.score };
        })
        .sort((a, b) => b.score - a.score || a.chunk.position - b.chunk.position)
        .slice(0, k);
    });
  }
}
