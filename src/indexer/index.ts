/**
 * Indexer Module
 *
 * Loads documents, splits them into chunks, embeds the chunks and
 * publishes them as a session's index.
 *
 * @example
 * ```ts
 * import { DocumentIndexer } from './indexer/index.js';
 *
 * const indexer = new DocumentIndexer(vectorIndex, embeddingProvider, {
 *   chunking: { chunkSize: 800, chunkOverlap: 100 },
 * });
 * const handle = await indexer.indexFile('session-1', './paper.pdf');
 * console.log(`${handle.chunkCount} chunks indexed`);
 * ```
 */

export {
  DocumentIndexer,
  indexerOptionsFromConfig,
  type DocumentIndexerOptions,
  type IndexRunOptions,
} from './document-indexer.js';
export { loadDocument, extractPdfText, type LoadedDocument } from './loader.js';
export * from './chunker/index.js';
export * from './embedder/index.js';
