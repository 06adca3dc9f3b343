/**
 * Anthropic Claude Provider
 *
 * Creates a completion provider for Claude models through @ai-sdk/anthropic.
 *
 * SECURITY: The API key is read only after validation passes and is
 * never included in error messages.
 */

import { createAnthropic } from '@ai-sdk/anthropic';
import { getProviderKey } from './validation.js';
import {
  LanguageModelCompletionProvider,
  type CompletionOptions,
  type CompletionProvider,
} from './completion.js';

export interface AnthropicProviderOptions {
  /**
   * Model to use for completions.
   * @default 'claude-3-5-haiku-latest'
   */
  model?: string;

  /** Generation defaults applied when a call does not set them */
  defaults?: CompletionOptions;
}

export interface AnthropicProviderResult {
  provider: CompletionProvider;
  name: 'anthropic';
  model: string;
}

/** Small, fast Claude model; answers here are short and grounded */
export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-latest';

/**
 * Create a configured Anthropic provider.
 *
 * @throws Error if ANTHROPIC_API_KEY is missing or malformed (with setup instructions)
 *
 * @example
 * ```typescript
 * const { provider } = createAnthropicProvider({ model: 'claude-3-5-sonnet-latest' });
 * const answer = await provider.complete('Hello!');
 * ```
 */
export function createAnthropicProvider(
  options: AnthropicProviderOptions = {}
): AnthropicProviderResult {
  const apiKey = getProviderKey('anthropic');
  const model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  const anthropic = createAnthropic({ apiKey });

  return {
    provider: new LanguageModelCompletionProvider(
      'anthropic',
      model,
      anthropic(model),
      options.defaults
    ),
    name: 'anthropic',
    model,
  };
}
