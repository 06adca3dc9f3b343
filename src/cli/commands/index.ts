/**
 * Index Command
 *
 * Loads, chunks and embeds a document and reports what an index of it
 * looks like. Nothing is kept: the index lives in memory for the
 * duration of the command.
 *
 * Usage:
 *   skydoc index ./paper.pdf
 *   skydoc index notes.md --json
 *   skydoc index notes.md --verbose   Show chunking and embedding details
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createEmbeddingProvider } from '../../indexer/embedder/provider.js';
import { DocumentIndexer, indexerOptionsFromConfig } from '../../indexer/document-indexer.js';
import { InMemoryVectorStore } from '../../search/memory-store.js';
import { VectorIndex } from '../../search/vector-index.js';
import { indexWithProgress } from '../utils/progress.js';

const SESSION_ID = 'index';

/**
 * JSON output format for the index command.
 */
interface IndexOutputJSON {
  file: string;
  chunks: number;
  dimensions: number;
  embeddingModel: string;
}

/**
 * Create the index command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIndexCommand(getContext: () => CommandContext): Command {
  return new Command('index')
    .argument('<file>', 'Document to index (.pdf, .txt, .md)')
    .description('Chunk and embed a document and report the result (nothing is stored)')
    .action(async (file: string) => {
      const ctx = getContext();

      const config = loadConfig();
      ctx.debug(`Embedding provider: ${config.embedding.provider}`);
      ctx.debug(`Embedding model: ${config.embedding.model}`);

      const embedding = await createEmbeddingProvider(config.embedding, { logger: ctx });
      const vectorIndex = new VectorIndex(new InMemoryVectorStore(), ctx);
      const indexer = new DocumentIndexer(
        vectorIndex,
        embedding.provider,
        indexerOptionsFromConfig(config, ctx)
      );

      try {
        const handle = await indexWithProgress(ctx, file, (onProgress) =>
          indexer.indexFile(SESSION_ID, file, { onProgress })
        );

        if (ctx.options.json) {
          const output: IndexOutputJSON = {
            file: resolve(file),
            chunks: handle.chunkCount,
            dimensions: handle.dimensions,
            embeddingModel: embedding.model,
          };
          console.log(JSON.stringify(output, null, 2));
        }
      } finally {
        await vectorIndex.endSession(SESSION_ID);
      }
    });
}
