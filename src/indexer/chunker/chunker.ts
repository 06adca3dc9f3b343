/**
 * Chunker
 *
 * Turns one document into an ordered list of frozen Chunk records.
 * Splitting is delegated to the recursive strategy of @mastra/rag, which
 * tries paragraph, line, sentence and word boundaries before cutting text.
 */

import { createHash } from 'node:crypto';
import { MDocument } from '@mastra/rag';
import type { Chunk, ChunkOptions } from './types.js';
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from './config.js';

/**
 * Stable chunk id: sha256 of session, position and text, shaped as a UUID
 * so that every vector store accepts it as a point id.
 */
export function createChunkId(sessionId: string, position: number, text: string): string {
  const hex = createHash('sha256')
    .update(`${sessionId}\u0000${position}\u0000${text}`)
    .digest('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');
}

/**
 * Split a document into chunks for one session.
 * Returns an empty array for blank text; callers decide whether that is an error.
 *
 * @throws RangeError when chunkSize is not positive or chunkOverlap is not smaller than it
 *
 * @example
 * ```typescript
 * const chunks = await chunkDocument('session-1', text, { chunkSize: 800, chunkOverlap: 100 });
 * chunks[0].position; // 0
 * ```
 */
export async function chunkDocument(
  sessionId: string,
  text: string,
  options: ChunkOptions = {}
): Promise<Chunk[]> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be at least 0 and smaller than chunkSize (${chunkOverlap} >= ${chunkSize})`
    );
  }

  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return [];
  }

  const doc = MDocument.fromText(trimmed);
  const pieces = await doc.chunk({
    strategy: 'recursive',
    maxSize: chunkSize,
    overlap: chunkOverlap,
  });

  return pieces
    .map((piece) => piece.text.trim())
    .filter((piece) => piece.length > 0)
    .map((piece, position) =>
      Object.freeze({
        id: createChunkId(sessionId, position, piece),
        text: piece,
        position,
      })
    );
}
