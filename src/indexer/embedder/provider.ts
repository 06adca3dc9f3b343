/**
 * Embedding Provider Factory
 *
 * Creates embedding providers from configuration. Supports:
 * - Ollama (local server, default nomic-embed-text)
 * - OpenAI (text-embedding-3-*)
 * - Any OpenAI-compatible embeddings endpoint
 *
 * Every backend is an AI SDK EmbeddingModel, wrapped with a cache so
 * repeated texts (re-indexing, repeated questions) are embedded once.
 */

import { embed, embedMany, type EmbeddingModel } from 'ai';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';

import { getOllamaHost, getOpenAICompatibleConfig } from '../../config/env.js';
import { getProviderKey, validateOllamaHostUrl } from '../../providers/validation.js';
import { isOllamaAvailable } from '../../providers/ollama.js';
import { consoleLogger } from '../../utils/index.js';
import type {
  EmbeddingConfig,
  EmbeddingProvider,
  EmbeddingProviderResult,
  EmbeddingProviderType,
  ProviderOptions,
} from './types.js';

const DEFAULT_CACHE_SIZE = 1000;

/**
 * EmbeddingProvider backed by an AI SDK embedding model.
 */
export class LanguageModelEmbeddingProvider implements EmbeddingProvider {
  constructor(
    readonly name: EmbeddingProviderType,
    readonly model: string,
    readonly dimensions: number,
    private readonly embeddingModel: EmbeddingModel<string>
  ) {}

  async embed(text: string): Promise<number[]> {
    const { embedding } = await embed({ model: this.embeddingModel, value: text });
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const { embeddings } = await embedMany({ model: this.embeddingModel, values: texts });
    return embeddings;
  }
}

/**
 * Caches vectors by text in front of another provider.
 * Oldest entries are evicted first once maxSize is reached.
 */
export class CachedEmbeddingProvider implements EmbeddingProvider {
  private readonly cache = new Map<string, number[]>();

  constructor(
    private readonly inner: EmbeddingProvider,
    private readonly maxSize = DEFAULT_CACHE_SIZE
  ) {}

  get name(): string {
    return this.inner.name;
  }

  get model(): string {
    return this.inner.model;
  }

  get dimensions(): number {
    return this.inner.dimensions;
  }

  get size(): number {
    return this.cache.size;
  }

  async embed(text: string): Promise<number[]> {
    const cached = this.cache.get(text);
    if (cached) {
      return cached;
    }
    const vector = await this.inner.embed(text);
    this.remember(text, vector);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    // Vectors for this call only; the batch may exceed the cache size
    const resolved = new Map<string, number[]>();
    const missing = new Set<string>();
    for (const text of texts) {
      const cached = this.cache.get(text);
      if (cached) {
        resolved.set(text, cached);
      } else {
        missing.add(text);
      }
    }

    if (missing.size > 0) {
      const pending = [...missing];
      const vectors = await this.inner.embedBatch(pending);
      if (vectors.length !== pending.length) {
        throw new Error(
          `Embedding count mismatch: expected ${pending.length}, got ${vectors.length}`
        );
      }
      pending.forEach((text, i) => {
        const vector = vectors[i];
        if (vector) {
          resolved.set(text, vector);
          this.remember(text, vector);
        }
      });
    }

    return texts.map((text) => {
      const vector = resolved.get(text);
      if (!vector) {
        throw new Error('Embedding provider returned no vector for a batch entry');
      }
      return vector;
    });
  }

  clear(): void {
    this.cache.clear();
  }

  private remember(text: string, vector: number[]): void {
    if (this.maxSize <= 0) {
      return;
    }
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(text, vector);
  }
}

async function createOllamaEmbeddingModel(
  model: string,
  options: ProviderOptions
): Promise<EmbeddingModel<string>> {
  const host = getOllamaHost();
  const validation = validateOllamaHostUrl(host);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  if (!options.skipAvailabilityCheck && !(await isOllamaAvailable(host))) {
    throw new Error(
      `Embedding provider 'ollama' is not available at ${host}. ` +
        `Make sure Ollama is running (ollama serve) and the model is pulled (ollama pull ${model}).`
    );
  }

  return createOpenAICompatible({
    name: 'ollama',
    baseURL: new URL('/v1', host).toString(),
  }).textEmbeddingModel(model);
}

function createOpenAICompatibleEmbeddingModel(model: string): EmbeddingModel<string> {
  const apiKey = getProviderKey('openai-compatible');
  const { baseUrl } = getOpenAICompatibleConfig();
  if (!baseUrl) {
    throw new Error('OpenAI-compatible embeddings need OPENAI_COMPATIBLE_BASE_URL');
  }
  return createOpenAICompatible({ name: 'openai-compatible', baseURL: baseUrl, apiKey })
    .textEmbeddingModel(model);
}

/**
 * Create an embedding provider from configuration.
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const { provider, dimensions } = await createEmbeddingProvider(config.embedding);
 *
 * const vector = await provider.embed('Hello, world!');
 * vector.length === dimensions; // 768 for nomic-embed-text
 * ```
 *
 * @throws Error if the provider's key is missing or its server is unreachable
 */
export async function createEmbeddingProvider(
  config: EmbeddingConfig,
  options: ProviderOptions = {}
): Promise<EmbeddingProviderResult> {
  const logger = options.logger ?? consoleLogger;
  const dimensions = config.dimensions ?? getModelDimensions(config.model);

  let embeddingModel: EmbeddingModel<string>;
  switch (config.provider) {
    case 'ollama':
      embeddingModel = await createOllamaEmbeddingModel(config.model, options);
      break;
    case 'openai':
      embeddingModel = createOpenAI({ apiKey: getProviderKey('openai') }).textEmbeddingModel(
        config.model
      );
      break;
    case 'openai-compatible':
      embeddingModel = createOpenAICompatibleEmbeddingModel(config.model);
      break;
  }

  logger.debug?.(`Embedding with ${config.provider}/${config.model} (${dimensions} dimensions)`);

  const provider = new CachedEmbeddingProvider(
    new LanguageModelEmbeddingProvider(config.provider, config.model, dimensions, embeddingModel),
    options.cacheSize ?? DEFAULT_CACHE_SIZE
  );

  return { provider, model: config.model, dimensions };
}

/**
 * Get the expected embedding dimensions for a model.
 * Set `embedding.dimensions` in config for models not listed here.
 */
export function getModelDimensions(model: string): number {
  const normalizedModel = model.toLowerCase();

  // Ollama models
  if (normalizedModel.includes('nomic-embed')) return 768;
  if (normalizedModel.includes('mxbai-embed')) return 1024;
  if (normalizedModel.includes('all-minilm')) return 384;

  // BGE models (various sizes)
  if (normalizedModel.includes('bge-large')) return 1024;
  if (normalizedModel.includes('bge-base')) return 768;
  if (normalizedModel.includes('bge-small')) return 384;

  // OpenAI models
  if (normalizedModel.includes('text-embedding-3-large')) return 3072;
  if (normalizedModel.includes('text-embedding-3-small')) return 1536;
  if (normalizedModel.includes('text-embedding-ada')) return 1536;

  return 1024;
}
