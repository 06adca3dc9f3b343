/**
 * Answer Pipeline
 *
 * Wires router, indexer, retriever, synthesizer and executor around
 * injected capabilities, and exposes the operations callers use:
 * indexDocument, indexFile, answer and endSession.
 *
 * @example
 * ```typescript
 * const { pipeline } = await buildPipeline(loadConfig(), { logger });
 *
 * await pipeline.indexFile('session-1', './paper.pdf');
 * const result = await pipeline.answer('What is the main finding?', 'session-1');
 * console.log(result.route, result.answer);
 * ```
 */

import type { Config } from '../config/schema.js';
import {
  DocumentIndexer,
  indexerOptionsFromConfig,
  type IndexRunOptions,
} from '../indexer/document-indexer.js';
import { createEmbeddingProvider } from '../indexer/embedder/provider.js';
import type { EmbeddingProvider, EmbeddingProviderResult } from '../indexer/embedder/types.js';
import type { CompletionProvider } from '../providers/completion.js';
import {
  createLLMProvider,
  type FallbackOptions,
  type LLMProviderResultWithFallback,
} from '../providers/llm.js';
import { createVectorStore } from '../search/factory.js';
import { InMemoryVectorStore } from '../search/memory-store.js';
import { Retriever } from '../search/retriever.js';
import type { IndexHandle, VectorStore } from '../search/types.js';
import { VectorIndex } from '../search/vector-index.js';
import { silentLogger, type Logger } from '../utils/index.js';
import { OpenWeatherClient } from '../weather/client.js';
import type { WeatherProvider } from '../weather/types.js';
import { AgentExecutor, toAnswerResult } from './executor.js';
import { QueryRouter } from './router.js';
import { Synthesizer } from './synthesizer.js';
import type { AgentState, AnswerResult } from './types.js';

/**
 * External capabilities the pipeline runs on.
 */
export interface PipelineCapabilities {
  completion: CompletionProvider;
  embedding: EmbeddingProvider;
  weather: WeatherProvider;
  /** @default InMemoryVectorStore */
  vectorStore?: VectorStore;
  logger?: Logger;
}

export class AnswerPipeline {
  private readonly vectorIndex: VectorIndex;
  private readonly indexer: DocumentIndexer;
  private readonly executor: AgentExecutor;

  constructor(
    private readonly config: Config,
    capabilities: PipelineCapabilities
  ) {
    const logger = capabilities.logger ?? silentLogger;
    this.vectorIndex = new VectorIndex(capabilities.vectorStore ?? new InMemoryVectorStore(), logger);

    this.indexer = new DocumentIndexer(
      this.vectorIndex,
      capabilities.embedding,
      indexerOptionsFromConfig(config, logger)
    );

    this.executor = new AgentExecutor({
      router: new QueryRouter({ weatherKeywords: config.router.weather_keywords }),
      vectorIndex: this.vectorIndex,
      retriever: new Retriever(this.vectorIndex, capabilities.embedding),
      weather: capabilities.weather,
      synthesizer: new Synthesizer(capabilities.completion),
      topK: config.retrieval.top_k,
      logger,
    });
  }

  /**
   * Index text as the session's document, replacing any earlier one.
   */
  indexDocument(
    sessionId: string,
    text: string,
    options: IndexRunOptions = {}
  ): Promise<IndexHandle> {
    return this.indexer.index(sessionId, text, options);
  }

  /**
   * Load a .pdf, .txt or .md file and index it for the session.
   */
  indexFile(sessionId: string, path: string, options: IndexRunOptions = {}): Promise<IndexHandle> {
    return this.indexer.indexFile(sessionId, path, options);
  }

  /**
   * Answer one query. Failures are reported in `error`, never thrown.
   */
  async answer(query: string, sessionId: string): Promise<AnswerResult> {
    return toAnswerResult(await this.run(query, sessionId), this.config.weather.units);
  }

  /**
   * Answer one query and return the full agent state.
   */
  run(query: string, sessionId: string): Promise<AgentState> {
    return this.executor.run(query, sessionId);
  }

  /**
   * Drop the session's index.
   *
   * @returns true if the session had an index
   */
  endSession(sessionId: string): Promise<boolean> {
    return this.vectorIndex.endSession(sessionId);
  }

  hasIndex(sessionId: string): boolean {
    return this.vectorIndex.has(sessionId);
  }

  getHandle(sessionId: string): IndexHandle | undefined {
    return this.vectorIndex.getHandle(sessionId);
  }

  get vectorStoreName(): string {
    return this.vectorIndex.storeName;
  }
}

export function createPipeline(config: Config, capabilities: PipelineCapabilities): AnswerPipeline {
  return new AnswerPipeline(config, capabilities);
}

export interface BuildPipelineOptions {
  logger?: Logger;
  /** Override the configured LLM model */
  model?: string;
  fallback?: FallbackOptions;
}

export interface BuiltPipeline {
  pipeline: AnswerPipeline;
  llm: LLMProviderResultWithFallback;
  embedding: EmbeddingProviderResult;
}

/**
 * Create every capability from configuration and the environment,
 * then wire the pipeline.
 *
 * @throws AllProvidersFailedError if no LLM provider can be created
 * @throws Error if the embedding provider cannot be created
 * @throws ConfigError if the vector store is misconfigured
 */
export async function buildPipeline(
  config: Config,
  options: BuildPipelineOptions = {}
): Promise<BuiltPipeline> {
  const logger = options.logger ?? silentLogger;

  const llm = await createLLMProvider(config, { model: options.model, fallback: options.fallback });
  const embedding = await createEmbeddingProvider(config.embedding, { logger });

  const pipeline = createPipeline(config, {
    completion: llm.provider,
    embedding: embedding.provider,
    weather: new OpenWeatherClient({
      baseUrl: config.weather.base_url,
      units: config.weather.units,
      timeoutMs: config.weather.timeout_ms,
    }),
    vectorStore: createVectorStore(config.vector_store),
    logger,
  });

  return { pipeline, llm, embedding };
}
