/**
 * Chunking Configuration
 *
 * Sizes are in characters. 800/100 keeps a chunk to roughly 200 tokens,
 * small enough that eight of them fit comfortably in one prompt.
 */

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 100;
