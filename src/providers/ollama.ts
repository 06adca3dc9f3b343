/**
 * Ollama Local LLM Provider
 *
 * Ollama serves an OpenAI-compatible API under /v1, so local models go
 * through @ai-sdk/openai-compatible as well. No API key is needed.
 */

import { createOpenAICompatible } from '@ai-sdk/openai-compatible';
import { getOllamaHost } from '../config/env.js';
import { validateOllamaHostUrl } from './validation.js';
import {
  LanguageModelCompletionProvider,
  type CompletionOptions,
  type CompletionProvider,
} from './completion.js';

export interface OllamaProviderOptions {
  /**
   * Model to use for completions.
   * @default 'llama3.2'
   */
  model?: string;

  /**
   * Ollama server URL. Falls back to OLLAMA_HOST, then http://localhost:11434.
   */
  host?: string;

  /**
   * Skip the server reachability check.
   * @default false
   */
  skipAvailabilityCheck?: boolean;

  /** Generation defaults applied when a call does not set them */
  defaults?: CompletionOptions;
}

export interface OllamaProviderResult {
  provider: CompletionProvider;
  name: 'ollama';
  model: string;
  host: string;
}

export const DEFAULT_OLLAMA_MODEL = 'llama3.2';

/** Reachability check timeout */
const AVAILABILITY_TIMEOUT_MS = 3000;

/**
 * Check that an Ollama server answers at `host`.
 */
export async function isOllamaAvailable(host: string): Promise<boolean> {
  try {
    const response = await fetch(new URL('/api/tags', host), {
      signal: AbortSignal.timeout(AVAILABILITY_TIMEOUT_MS),
    });
    return response.ok;
  } catch {
    // Connection refused and timeouts both mean "not running"
    return false;
  }
}

/**
 * Create a configured Ollama provider.
 *
 * @throws Error if the host URL is invalid
 * @throws Error if the server is not running (unless skipAvailabilityCheck)
 *
 * @example
 * ```typescript
 * const { provider } = await createOllamaProvider({ model: 'qwen2.5' });
 * ```
 */
export async function createOllamaProvider(
  options: OllamaProviderOptions = {}
): Promise<OllamaProviderResult> {
  const host = options.host ?? getOllamaHost();

  const validation = validateOllamaHostUrl(host);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  const model = options.model ?? DEFAULT_OLLAMA_MODEL;

  if (!options.skipAvailabilityCheck && !(await isOllamaAvailable(host))) {
    throw new Error(
      `Ollama server is not available at ${host}.\n\n` +
        'To fix this:\n' +
        '1. Make sure Ollama is installed (https://ollama.com/)\n' +
        '2. Start the server: ollama serve\n' +
        `3. Pull the model: ollama pull ${model}`
    );
  }

  const ollama = createOpenAICompatible({
    name: 'ollama',
    baseURL: new URL('/v1', host).toString(),
  });

  return {
    provider: new LanguageModelCompletionProvider(
      'ollama',
      model,
      ollama.chatModel(model),
      options.defaults
    ),
    name: 'ollama',
    model,
    host,
  };
}
