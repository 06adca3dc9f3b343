/**
 * Providers Module
 *
 * Completion providers and their credential checks.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createLLMProvider } from './providers/index.js';
 * const { provider } = await createLLMProvider(config);
 * ```
 */

export {
  validateProviderKey,
  validateAnthropicKey,
  validateOpenAIKey,
  validateOpenAICompatible,
  validateOllamaHostUrl,
  getProviderKey,
  AnthropicKeySchema,
  OpenAIKeySchema,
  HttpUrlSchema,
  type ValidationResult,
  type ValidatedProvider,
} from './validation.js';

export {
  LanguageModelCompletionProvider,
  type CompletionProvider,
  type CompletionOptions,
  type ProviderType,
} from './completion.js';

export {
  createLLMProvider,
  AllProvidersFailedError,
  type LLMProviderResult,
  type LLMProviderResultWithFallback,
  type LLMProviderOptions,
  type FallbackOptions,
  type ProviderAttempt,
} from './llm.js';

export { createAnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
export {
  createOpenAIProvider,
  createOpenAICompatibleProvider,
  DEFAULT_OPENAI_MODEL,
  DEFAULT_OPENAI_COMPATIBLE_MODEL,
} from './openai.js';
export { createOllamaProvider, isOllamaAvailable, DEFAULT_OLLAMA_MODEL } from './ollama.js';
