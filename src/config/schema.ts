/**
 * Configuration Schema
 *
 * Defines the shape of ~/.skydoc/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * LLM provider type (used in multiple schemas)
 */
export const LLMProviderTypeSchema = z.enum(['openai-compatible', 'anthropic', 'openai', 'ollama']);

/**
 * Embedding provider type.
 * All three speak an OpenAI-style embeddings API through the AI SDK.
 */
export const EmbeddingProviderTypeSchema = z.enum(['openai', 'ollama', 'openai-compatible']);

/**
 * LLM generation settings and fallback chain
 */
export const LLMConfigSchema = z.object({
  temperature: z
    .number()
    .min(0)
    .max(2)
    .describe('Sampling temperature for answers (low keeps answers close to the context)'),
  max_tokens: z.number().int().min(16).max(8192).describe('Maximum tokens per answer'),
  /** Fallback providers in order of preference (omit to use defaults) */
  fallback_providers: z
    .array(LLMProviderTypeSchema)
    .optional()
    .describe('Fallback providers if primary fails (e.g., ["openai", "ollama"])'),
  /** Model to use per fallback provider (uses defaults if omitted) */
  fallback_models: z
    .record(LLMProviderTypeSchema, z.string())
    .optional()
    .describe('Model to use per fallback provider (e.g., { openai: "gpt-4o-mini" })'),
});

/**
 * Embedding provider configuration
 */
export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTypeSchema.describe('Embedding provider'),
  model: z.string().describe('Embedding model name'),
  dimensions: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Vector size; inferred from the model name when omitted'),
  batch_size: z
    .number()
    .int()
    .min(1)
    .max(256)
    .default(32)
    .describe('Number of texts to embed per request (1-256, default 32)'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .default(60000)
    .describe('Timeout in milliseconds for one embedding request'),
});

/**
 * Vector store backend
 */
export const VectorStoreConfigSchema = z.object({
  provider: z.enum(['memory', 'qdrant']).describe('memory (in-process) or qdrant (server)'),
  url: z.string().url().optional().describe('Qdrant URL; QDRANT_URL env var takes precedence'),
});

/**
 * Document chunking
 */
export const ChunkingConfigSchema = z
  .object({
    chunk_size: z.number().int().min(50).max(20000).describe('Target chunk size in characters'),
    chunk_overlap: z.number().int().min(0).max(5000).describe('Characters shared by consecutive chunks'),
  })
  .refine((c) => c.chunk_overlap < c.chunk_size, {
    message: 'chunk_overlap must be smaller than chunk_size',
    path: ['chunk_overlap'],
  });

/**
 * Retrieval configuration
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(100).describe('Number of chunks to retrieve'),
});

/**
 * Router configuration
 */
export const RouterConfigSchema = z.object({
  weather_keywords: z
    .array(z.string().min(1))
    .min(1)
    .describe('Terms that route a query to the weather lookup'),
});

/**
 * Weather provider configuration
 */
export const WeatherConfigSchema = z.object({
  base_url: z.string().url().describe('Current-weather endpoint'),
  units: z.enum(['metric', 'imperial', 'standard']).describe('Units requested from the API'),
  timeout_ms: z.number().int().min(1000).max(120000).describe('Request timeout'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  default_provider: LLMProviderTypeSchema.describe('LLM provider to use'),
  default_model: z.string().describe('Default LLM model'),
  llm: LLMConfigSchema,
  embedding: EmbeddingConfigSchema,
  vector_store: VectorStoreConfigSchema,
  chunking: ChunkingConfigSchema,
  retrieval: RetrievalConfigSchema,
  router: RouterConfigSchema,
  weather: WeatherConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;

/**
 * Partial config for merging user overrides with defaults.
 *
 * Built by hand rather than with deepPartial(): the chunking refinement
 * wraps its object in ZodEffects, which deepPartial does not descend into.
 */
export const PartialConfigSchema = z.object({
  default_provider: LLMProviderTypeSchema.optional(),
  default_model: z.string().optional(),
  llm: LLMConfigSchema.partial().optional(),
  embedding: EmbeddingConfigSchema.partial().optional(),
  vector_store: VectorStoreConfigSchema.partial().optional(),
  chunking: z
    .object({
      chunk_size: z.number().int().min(50).max(20000),
      chunk_overlap: z.number().int().min(0).max(5000),
    })
    .partial()
    .optional(),
  retrieval: RetrievalConfigSchema.partial().optional(),
  router: RouterConfigSchema.partial().optional(),
  weather: WeatherConfigSchema.partial().optional(),
});
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
