/**
 * Document Indexer
 *
 * chunk -> embed (batched) -> write a fresh generation -> publish.
 *
 * Indexing is all-or-nothing: an embedding or store failure leaves the
 * session's previous index (if any) untouched.
 */

import type { Config } from '../config/schema.js';
import { EmptyDocumentError } from '../errors/index.js';
import type { IndexHandle, VectorPoint } from '../search/types.js';
import type { VectorIndex } from '../search/vector-index.js';
import { silentLogger, withPrefix, type Logger } from '../utils/index.js';
import { chunkDocument } from './chunker/chunker.js';
import type { ChunkOptions } from './chunker/types.js';
import { embedChunks } from './embedder/embedder.js';
import type { EmbeddingProvider } from './embedder/types.js';
import { loadDocument } from './loader.js';

export interface DocumentIndexerOptions {
  chunking?: ChunkOptions;
  /** Texts per embedding request (default 32) */
  batchSize?: number;
  /** Timeout per embedding request in milliseconds */
  timeout?: number;
  logger?: Logger;
}

export interface IndexRunOptions {
  /** Called after each embedded batch */
  onProgress?: (embedded: number, total: number) => void;
}

/**
 * Indexer options from the chunking and embedding sections of config.
 */
export function indexerOptionsFromConfig(config: Config, logger?: Logger): DocumentIndexerOptions {
  return {
    chunking: {
      chunkSize: config.chunking.chunk_size,
      chunkOverlap: config.chunking.chunk_overlap,
    },
    batchSize: config.embedding.batch_size,
    timeout: config.embedding.timeout_ms,
    logger,
  };
}

export class DocumentIndexer {
  private readonly logger: Logger;

  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly options: DocumentIndexerOptions = {}
  ) {
    this.logger = withPrefix('indexer', options.logger ?? silentLogger);
  }

  /**
   * Index `documentText` as the session's current document, replacing
   * any earlier one.
   *
   * @throws EmptyDocumentError for blank text
   * @throws UpstreamCapabilityError if embedding or the vector store fails
   * @throws EmbeddingDimensionMismatchError if a vector has the wrong length
   */
  async index(
    sessionId: string,
    documentText: string,
    options: IndexRunOptions = {}
  ): Promise<IndexHandle> {
    if (!documentText.trim()) {
      throw new EmptyDocumentError();
    }

    const chunks = await chunkDocument(sessionId, documentText, this.options.chunking);
    this.logger.debug?.(`Split ${documentText.length} characters into ${chunks.length} chunks`);

    const embedded = await embedChunks(chunks, this.embeddingProvider, {
      batchSize: this.options.batchSize,
      timeout: this.options.timeout,
      onProgress: options.onProgress,
    });

    const points: VectorPoint[] = embedded.map(({ chunk, vector }) => ({
      id: chunk.id,
      vector,
      payload: { text: chunk.text, position: chunk.position },
    }));

    const handle = await this.vectorIndex.replace(
      sessionId,
      points,
      this.embeddingProvider.dimensions
    );
    this.logger.debug?.(
      `Session ${sessionId} now at generation ${handle.generation} (${handle.chunkCount} chunks)`
    );
    return handle;
  }

  /**
   * Load a document from disk and index it.
   *
   * @throws FileNotFoundError, ValidationError or EmptyDocumentError from loading
   */
  async indexFile(
    sessionId: string,
    path: string,
    options: IndexRunOptions = {}
  ): Promise<IndexHandle> {
    const document = await loadDocument(path);
    for (const warning of document.warnings) {
      this.logger.warn(warning);
    }
    return this.index(sessionId, document.text, options);
  }
}
