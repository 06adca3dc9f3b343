/**
 * Vector Store Factory
 *
 * Picks the backend from config.vector_store.
 */

import type { Config } from '../config/schema.js';
import { getEnv } from '../config/env.js';
import { ConfigError } from '../errors/index.js';
import { InMemoryVectorStore } from './memory-store.js';
import { QdrantVectorStore } from './qdrant-store.js';
import type { VectorStore } from './types.js';

/**
 * Create the configured vector store.
 *
 * For qdrant, QDRANT_URL takes precedence over vector_store.url.
 *
 * @throws ConfigError if qdrant is selected without a URL
 */
export function createVectorStore(config: Config['vector_store']): VectorStore {
  switch (config.provider) {
    case 'memory':
      return new InMemoryVectorStore();
    case 'qdrant': {
      const url = getEnv('QDRANT_URL') ?? config.url;
      if (!url) {
        throw new ConfigError(
          'vector_store.provider is "qdrant" but no Qdrant URL is configured',
          'Set QDRANT_URL or run: skydoc config set vector_store.url http://localhost:6333'
        );
      }
      return QdrantVectorStore.fromOptions({ url, apiKey: getEnv('QDRANT_API_KEY') });
    }
  }
}
