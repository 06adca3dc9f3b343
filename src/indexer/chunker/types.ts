/**
 * Chunker Types
 */

/**
 * A contiguous span of document text.
 * Frozen once created; `position` is its 0-based order in the document.
 */
export interface Chunk {
  /** Stable identifier derived from session, position and text (UUID-shaped) */
  readonly id: string;
  readonly text: string;
  readonly position: number;
}

/**
 * Options controlling how a document is split.
 */
export interface ChunkOptions {
  /**
   * Target maximum chunk length in characters.
   * @default 800
   */
  chunkSize?: number;

  /**
   * Characters carried from the end of one chunk into the start of the next.
   * Must be smaller than chunkSize.
   * @default 100
   */
  chunkOverlap?: number;
}
