/**
 * API Key Validators
 *
 * Checks provider credentials without exposing key values.
 *
 * SECURITY: These functions NEVER log or return the actual key.
 * They only report presence/absence and format validity.
 */

import { z } from 'zod';
import {
  getEnv,
  getOllamaHost,
  getOpenAICompatibleConfig,
  SETUP_INSTRUCTIONS,
} from '../config/env.js';

/**
 * Result of validating a provider's credentials.
 *
 * When valid: { valid: true }
 * When invalid: { valid: false, error, setupInstructions }
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

/** Providers whose credentials come from the environment */
export type ValidatedProvider = 'anthropic' | 'openai' | 'ollama' | 'openai-compatible';

// ============================================================================
// FORMAT VALIDATORS (Zod schemas)
// ============================================================================

/**
 * Anthropic API key format: sk-ant-...
 * Only the common prefix is checked so newer key versions keep working.
 */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-ant-'),
    'Invalid Anthropic API key format (should start with "sk-ant-")'
  );

/**
 * OpenAI API key format: sk-... (legacy, sk-proj-, sk-svcacct-)
 */
export const OpenAIKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine(
    (key) => key.startsWith('sk-'),
    'Invalid OpenAI API key format (should start with "sk-")'
  );

/**
 * Any HTTP(S) base URL (Ollama host, OpenAI-compatible endpoint).
 */
export const HttpUrlSchema = z
  .string()
  .url('Invalid URL')
  .refine(
    (url) => url.startsWith('http://') || url.startsWith('https://'),
    'URL must use http:// or https://'
  );

function firstIssue(error: z.ZodError, fallback: string): string {
  return error.issues[0]?.message ?? fallback;
}

// ============================================================================
// VALIDATION FUNCTIONS
// ============================================================================

/**
 * Validate that the Anthropic key exists and has the right prefix.
 */
export function validateAnthropicKey(): ValidationResult {
  const key = getEnv('ANTHROPIC_API_KEY');
  if (!key) {
    return {
      valid: false,
      error: 'ANTHROPIC_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS.anthropic,
    };
  }

  const result = AnthropicKeySchema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: firstIssue(result.error, 'Invalid API key format'),
      setupInstructions: SETUP_INSTRUCTIONS.anthropic,
    };
  }

  return { valid: true };
}

/**
 * Validate that the OpenAI key exists and has the right prefix.
 */
export function validateOpenAIKey(): ValidationResult {
  const key = getEnv('OPENAI_API_KEY');
  if (!key) {
    return {
      valid: false,
      error: 'OPENAI_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS.openai,
    };
  }

  const result = OpenAIKeySchema.safeParse(key);
  if (!result.success) {
    return {
      valid: false,
      error: firstIssue(result.error, 'Invalid API key format'),
      setupInstructions: SETUP_INSTRUCTIONS.openai,
    };
  }

  return { valid: true };
}

/**
 * Validate the OpenAI-compatible endpoint (Groq by default).
 * Key formats differ per vendor, so only presence and the URL are checked.
 */
export function validateOpenAICompatible(): ValidationResult {
  const { apiKey, baseUrl } = getOpenAICompatibleConfig();
  if (!apiKey) {
    return {
      valid: false,
      error: 'GROQ_API_KEY (or OPENAI_COMPATIBLE_API_KEY) environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }
  if (!baseUrl) {
    return {
      valid: false,
      error: 'OPENAI_COMPATIBLE_BASE_URL environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  const result = HttpUrlSchema.safeParse(baseUrl);
  if (!result.success) {
    return {
      valid: false,
      error: `OPENAI_COMPATIBLE_BASE_URL: ${firstIssue(result.error, 'Invalid URL')}`,
      setupInstructions: SETUP_INSTRUCTIONS['openai-compatible'],
    };
  }

  return { valid: true };
}

/**
 * Validate a specific Ollama host URL.
 * Pass the host actually in use (options override the env var).
 */
export function validateOllamaHostUrl(host: string): ValidationResult {
  const result = HttpUrlSchema.safeParse(host);
  if (!result.success) {
    return {
      valid: false,
      error: `Invalid Ollama host URL: ${firstIssue(result.error, 'Invalid URL')}`,
      setupInstructions: SETUP_INSTRUCTIONS.ollama,
    };
  }
  return { valid: true };
}

/**
 * Validate the credentials for a given provider.
 * Call this before creating a provider.
 *
 * @example
 * ```typescript
 * const result = validateProviderKey(config.default_provider);
 * if (!result.valid) {
 *   console.error(result.error);
 *   console.log(result.setupInstructions);
 * }
 * ```
 */
export function validateProviderKey(provider: ValidatedProvider): ValidationResult {
  switch (provider) {
    case 'anthropic':
      return validateAnthropicKey();
    case 'openai':
      return validateOpenAIKey();
    case 'openai-compatible':
      return validateOpenAICompatible();
    case 'ollama':
      return validateOllamaHostUrl(getOllamaHost());
  }
}

// ============================================================================
// SECURE KEY ACCESS
// ============================================================================

/**
 * Get the API key for a provider after validating it.
 *
 * This is the ONLY function that returns a key value.
 * Pass it straight to an API client, never to a log line.
 *
 * @throws Error carrying the setup instructions if the key is missing or malformed
 */
export function getProviderKey(provider: 'anthropic' | 'openai' | 'openai-compatible'): string {
  const validation = validateProviderKey(provider);
  if (!validation.valid) {
    throw new Error(`${validation.error}\n\n${validation.setupInstructions}`);
  }

  const key =
    provider === 'anthropic'
      ? getEnv('ANTHROPIC_API_KEY')
      : provider === 'openai'
        ? getEnv('OPENAI_API_KEY')
        : getOpenAICompatibleConfig().apiKey;

  if (!key) {
    throw new Error(`${provider} API key is not configured`);
  }
  return key;
}
