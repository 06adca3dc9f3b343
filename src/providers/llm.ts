/**
 * LLM Provider Factory
 *
 * Central entry point for creating the completion provider from
 * configuration. Dispatches on config.default_provider and walks a
 * fallback chain when the primary cannot be created.
 *
 * USAGE:
 * ```typescript
 * const config = loadConfig();
 * const { provider, name, model } = await createLLMProvider(config);
 * const answer = await provider.complete('Hello!');
 * ```
 */

import type { Config } from '../config/schema.js';
import { isOpenAICompatibleConfigured, getOpenAICompatibleConfig } from '../config/env.js';
import type { CompletionOptions, CompletionProvider, ProviderType } from './completion.js';
import { createAnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
import {
  createOpenAIProvider,
  createOpenAICompatibleProvider,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENAI_COMPATIBLE_MODEL,
} from './openai.js';
import { createOllamaProvider, DEFAULT_OLLAMA_MODEL } from './ollama.js';

// ============================================================================
// TYPES
// ============================================================================

export type { ProviderType } from './completion.js';

/**
 * Result of creating an LLM provider.
 */
export interface LLMProviderResult {
  provider: CompletionProvider;
  /** Provider name for identification in logs */
  name: ProviderType;
  /** Model being used (e.g. 'llama-3.1-8b-instant', 'gpt-4o-mini') */
  model: string;
}

/**
 * Record of a failed provider creation attempt.
 */
export interface ProviderAttempt {
  provider: ProviderType;
  error: Error;
  timestamp: Date;
}

/**
 * Result including fallback metadata.
 */
export interface LLMProviderResultWithFallback extends LLMProviderResult {
  /** True if a fallback provider was used instead of the primary */
  usedFallback: boolean;
  /** The provider that was originally requested (from config) */
  requestedProvider: ProviderType;
  /** All failed attempts before success (empty if primary succeeded) */
  failedAttempts: ProviderAttempt[];
}

/**
 * Callbacks for monitoring fallback behavior.
 */
export interface FallbackOptions {
  /** Called when falling back from one provider to another */
  onFallback?: (from: ProviderType, to: ProviderType, reason: string) => void;
  /** Called when a provider attempt fails */
  onProviderFailed?: (provider: ProviderType, error: Error) => void;
  /** If true, fail immediately without trying fallback providers */
  disableFallback?: boolean;
}

/**
 * Error thrown when every provider in the fallback chain fails.
 */
export class AllProvidersFailedError extends Error {
  public readonly name = 'AllProvidersFailedError';

  constructor(
    /** All failed provider attempts in order */
    public readonly attempts: ProviderAttempt[],
    message?: string
  ) {
    const providers = attempts.map((a) => a.provider).join(' -> ');
    super(message ?? `All LLM providers failed. Tried: ${providers}`);
  }

  /** The most recent failure */
  get lastError(): Error | undefined {
    return this.attempts[this.attempts.length - 1]?.error;
  }
}

export interface LLMProviderOptions {
  /**
   * Override the model from config (primary provider only).
   */
  model?: string;

  /**
   * Skip the Ollama reachability check.
   * @default false
   */
  skipAvailabilityCheck?: boolean;

  /** Fallback behavior options */
  fallback?: FallbackOptions;
}

// ============================================================================
// FALLBACK CHAIN
// ============================================================================

/**
 * Default fallback chain for a provider.
 * A configured OpenAI-compatible endpoint is tried first.
 */
function getDefaultFallbackChain(primary: ProviderType): ProviderType[] {
  const baseChains: Record<ProviderType, ProviderType[]> = {
    'openai-compatible': ['anthropic', 'openai', 'ollama'],
    anthropic: ['openai', 'ollama'],
    openai: ['anthropic', 'ollama'],
    ollama: ['anthropic', 'openai'],
  };

  const chain = baseChains[primary];
  if (primary !== 'openai-compatible' && isOpenAICompatibleConfigured()) {
    return ['openai-compatible', ...chain];
  }
  return chain;
}

function getFallbackChain(config: Config, primary: ProviderType): ProviderType[] {
  if (config.llm.fallback_providers) {
    return config.llm.fallback_providers.filter((p) => p !== primary);
  }
  return getDefaultFallbackChain(primary);
}

/** Model for a provider reached through fallback */
function getFallbackModel(config: Config, provider: ProviderType): string {
  const configured = config.llm.fallback_models?.[provider];
  if (configured) {
    return configured;
  }

  switch (provider) {
    case 'anthropic':
      return DEFAULT_ANTHROPIC_MODEL;
    case 'openai':
      return DEFAULT_OPENAI_MODEL;
    case 'ollama':
      return DEFAULT_OLLAMA_MODEL;
    case 'openai-compatible':
      return getOpenAICompatibleConfig().model ?? DEFAULT_OPENAI_COMPATIBLE_MODEL;
  }
}

/**
 * Create a single provider. Throws on failure.
 */
async function tryCreateProvider(
  providerType: ProviderType,
  model: string,
  defaults: CompletionOptions,
  options: LLMProviderOptions
): Promise<LLMProviderResult> {
  switch (providerType) {
    case 'anthropic':
      return createAnthropicProvider({ model, defaults });
    case 'openai':
      return createOpenAIProvider({ model, defaults });
    case 'openai-compatible':
      return createOpenAICompatibleProvider({ model, defaults });
    case 'ollama': {
      const { provider, name } = await createOllamaProvider({
        model,
        defaults,
        skipAvailabilityCheck: options.skipAvailabilityCheck,
      });
      return { provider, name, model };
    }
    default: {
      const _exhaustiveCheck: never = providerType;
      throw new Error(`Unknown provider type: ${String(_exhaustiveCheck)}`);
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create the completion provider with automatic fallback.
 *
 * If the primary provider fails (missing key, server down), fallback
 * providers are tried in order until one succeeds.
 *
 * @throws AllProvidersFailedError if every provider fails
 *
 * @example
 * ```typescript
 * const { provider, name, usedFallback } = await createLLMProvider(config, {
 *   fallback: {
 *     onFallback: (from, to, reason) => console.warn(`${from} -> ${to}: ${reason}`),
 *   },
 * });
 * ```
 */
export async function createLLMProvider(
  config: Config,
  options: LLMProviderOptions = {}
): Promise<LLMProviderResultWithFallback> {
  const primaryProvider = config.default_provider;
  const primaryModel = options.model ?? config.default_model;
  const defaults: CompletionOptions = {
    temperature: config.llm.temperature,
    maxTokens: config.llm.max_tokens,
  };
  const failedAttempts: ProviderAttempt[] = [];

  try {
    const result = await tryCreateProvider(primaryProvider, primaryModel, defaults, options);
    return {
      ...result,
      usedFallback: false,
      requestedProvider: primaryProvider,
      failedAttempts: [],
    };
  } catch (error) {
    const err = toError(error);
    failedAttempts.push({ provider: primaryProvider, error: err, timestamp: new Date() });
    options.fallback?.onProviderFailed?.(primaryProvider, err);
  }

  if (options.fallback?.disableFallback) {
    throw new AllProvidersFailedError(failedAttempts);
  }

  for (const fallbackProvider of getFallbackChain(config, primaryProvider)) {
    const lastError = failedAttempts[failedAttempts.length - 1]?.error;
    options.fallback?.onFallback?.(
      primaryProvider,
      fallbackProvider,
      lastError?.message ?? 'Unknown error'
    );

    try {
      const result = await tryCreateProvider(
        fallbackProvider,
        getFallbackModel(config, fallbackProvider),
        defaults,
        options
      );
      return {
        ...result,
        usedFallback: true,
        requestedProvider: primaryProvider,
        failedAttempts,
      };
    } catch (error) {
      const err = toError(error);
      failedAttempts.push({ provider: fallbackProvider, error: err, timestamp: new Date() });
      options.fallback?.onProviderFailed?.(fallbackProvider, err);
    }
  }

  throw new AllProvidersFailedError(failedAttempts);
}
