/**
 * OpenAI and OpenAI-compatible Providers
 *
 * OpenAI itself goes through @ai-sdk/openai. Groq, OpenRouter, Together
 * and friends speak the same protocol and go through
 * @ai-sdk/openai-compatible with a custom base URL.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { getOpenAICompatibleConfig } from '../config/env.js';
import { getProviderKey } from './validation.js';
import {
  LanguageModelCompletionProvider,
  type CompletionOptions,
  type CompletionProvider,
} from './completion.js';

export interface OpenAIProviderOptions {
  /**
   * Model to use for completions.
   * @default 'gpt-4o-mini'
   */
  model?: string;

  /** Generation defaults applied when a call does not set them */
  defaults?: CompletionOptions;
}

export interface OpenAIProviderResult {
  provider: CompletionProvider;
  name: 'openai' | 'openai-compatible';
  model: string;
}

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/** Groq's Llama 3.1 8B, used when no model is configured for the endpoint */
export const DEFAULT_OPENAI_COMPATIBLE_MODEL = 'llama-3.1-8b-instant';

/**
 * Create a configured OpenAI provider.
 *
 * @throws Error if OPENAI_API_KEY is missing or malformed (with setup instructions)
 */
export function createOpenAIProvider(options: OpenAIProviderOptions = {}): OpenAIProviderResult {
  const apiKey = getProviderKey('openai');
  const model = options.model ?? DEFAULT_OPENAI_MODEL;
  const openai = createOpenAI({ apiKey });

  return {
    provider: new LanguageModelCompletionProvider('openai', model, openai(model), options.defaults),
    name: 'openai',
    model,
  };
}

/**
 * Create a provider for an OpenAI-compatible endpoint.
 * Uses OPENAI_COMPATIBLE_* variables, or Groq when only GROQ_API_KEY is set.
 *
 * @example
 * ```typescript
 * // GROQ_API_KEY=... in .env
 * const { provider, model } = createOpenAICompatibleProvider();
 * ```
 *
 * @throws Error if no key or base URL is configured
 */
export function createOpenAICompatibleProvider(
  options: OpenAIProviderOptions = {}
): OpenAIProviderResult {
  const apiKey = getProviderKey('openai-compatible');
  const { baseUrl, model: envModel } = getOpenAICompatibleConfig();
  if (!baseUrl) {
    throw new Error('OpenAI-compatible provider not configured: base URL is missing');
  }

  const model = options.model ?? envModel ?? DEFAULT_OPENAI_COMPATIBLE_MODEL;
  const compatible = createOpenAICompatible({ name: 'openai-compatible', baseURL: baseUrl, apiKey });

  return {
    provider: new LanguageModelCompletionProvider(
      'openai-compatible',
      model,
      compatible.chatModel(model),
      options.defaults
    ),
    name: 'openai-compatible',
    model,
  };
}
