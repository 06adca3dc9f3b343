/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to API keys and service URLs.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence and format validity are reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist - production uses real env vars
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/** Groq's OpenAI-compatible endpoint, used when only GROQ_API_KEY is set */
export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

/**
 * Empty strings count as unset (a blank line in .env yields "").
 */
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

/**
 * Environment variable schema with optional values.
 * Keys are not required at load time - validation happens on use, so only
 * the provider you actually use needs a key.
 */
export const EnvSchema = z.object({
  GROQ_API_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OLLAMA_HOST: z.string().default('http://localhost:11434'),
  // OpenAI-compatible provider (Groq, OpenRouter, Together, ...)
  OPENAI_COMPATIBLE_API_KEY: optionalString,
  OPENAI_COMPATIBLE_BASE_URL: optionalString,
  OPENAI_COMPATIBLE_MODEL: optionalString,
  // Weather lookups
  OPENWEATHER_API_KEY: optionalString,
  // Qdrant vector store
  QDRANT_URL: optionalString,
  QDRANT_API_KEY: optionalString,
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type KeyedProvider = 'anthropic' | 'openai' | 'openai-compatible' | 'openweather';

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Not exported - access through getEnv(). Tests reset it with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 * Does NOT validate key presence - that happens when you try to use a provider.
 *
 * @returns The parsed environment variables with defaults applied
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    GROQ_API_KEY: process.env.GROQ_API_KEY,
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    OPENAI_API_KEY: process.env.OPENAI_API_KEY,
    OLLAMA_HOST: process.env.OLLAMA_HOST || undefined,
    OPENAI_COMPATIBLE_API_KEY: process.env.OPENAI_COMPATIBLE_API_KEY,
    OPENAI_COMPATIBLE_BASE_URL: process.env.OPENAI_COMPATIBLE_BASE_URL,
    OPENAI_COMPATIBLE_MODEL: process.env.OPENAI_COMPATIBLE_MODEL,
    OPENWEATHER_API_KEY: process.env.OPENWEATHER_API_KEY,
    QDRANT_URL: process.env.QDRANT_URL,
    QDRANT_API_KEY: process.env.QDRANT_API_KEY,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 *
 * @param key - The environment variable name
 * @returns The value (may be undefined for optional keys)
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if an API key is configured (non-empty).
 * Returns true/false WITHOUT exposing the key value.
 *
 * @param provider - The provider to check
 * @returns true if the key exists and is non-empty
 */
export function hasApiKey(provider: KeyedProvider): boolean {
  switch (provider) {
    case 'anthropic':
      return Boolean(getEnv('ANTHROPIC_API_KEY'));
    case 'openai':
      return Boolean(getEnv('OPENAI_API_KEY'));
    case 'openai-compatible':
      return Boolean(getOpenAICompatibleConfig().apiKey);
    case 'openweather':
      return Boolean(getEnv('OPENWEATHER_API_KEY'));
  }
}

/**
 * Get the Ollama host URL.
 * Returns the default (localhost:11434) if not configured.
 */
export function getOllamaHost(): string {
  return getEnv('OLLAMA_HOST');
}

/**
 * Get OpenAI-compatible provider configuration.
 *
 * Explicit OPENAI_COMPATIBLE_* variables win. Otherwise a GROQ_API_KEY
 * selects Groq's endpoint.
 *
 * @returns Object with apiKey, baseUrl, and model (all optional)
 */
export function getOpenAICompatibleConfig(): {
  apiKey: string | undefined;
  baseUrl: string | undefined;
  model: string | undefined;
} {
  const env = loadEnv();
  if (env.OPENAI_COMPATIBLE_API_KEY || env.OPENAI_COMPATIBLE_BASE_URL) {
    return {
      apiKey: env.OPENAI_COMPATIBLE_API_KEY,
      baseUrl: env.OPENAI_COMPATIBLE_BASE_URL,
      model: env.OPENAI_COMPATIBLE_MODEL,
    };
  }
  return {
    apiKey: env.GROQ_API_KEY,
    baseUrl: env.GROQ_API_KEY ? GROQ_BASE_URL : undefined,
    model: env.OPENAI_COMPATIBLE_MODEL,
  };
}

/**
 * Check if OpenAI-compatible provider is fully configured.
 * Requires API key and base URL at minimum.
 */
export function isOpenAICompatibleConfigured(): boolean {
  const config = getOpenAICompatibleConfig();
  return Boolean(config.apiKey && config.baseUrl);
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Provider-specific setup instructions.
 * Shown when a required API key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<'anthropic' | 'openai' | 'ollama' | 'openai-compatible' | 'openweather', string> = {
  anthropic: `
To use Anthropic (Claude) models:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable (or add it to .env):

   export ANTHROPIC_API_KEY="sk-ant-..."

3. Select the provider: skydoc config set default_provider anthropic
`.trim(),

  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. Set the environment variable (or add it to .env):

   export OPENAI_API_KEY="sk-..."
`.trim(),

  ollama: `
To use Ollama (local models):

1. Install Ollama from https://ollama.com/
2. Start the server:

   ollama serve

3. Pull the models:

   ollama pull llama3.2
   ollama pull nomic-embed-text

4. (Optional) Set custom host:

   export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  'openai-compatible': `
The default provider is Groq's OpenAI-compatible API:

1. Get a key from https://console.groq.com/keys
2. Add it to .env (or export it):

   GROQ_API_KEY="your-groq-key"

Any other OpenAI-compatible endpoint works too:

   OPENAI_COMPATIBLE_API_KEY="your-api-key"
   OPENAI_COMPATIBLE_BASE_URL="https://api.example.com/v1"
   OPENAI_COMPATIBLE_MODEL="model-name"
`.trim(),

  openweather: `
Weather questions need an OpenWeatherMap key:

1. Create a free key at https://home.openweathermap.org/api_keys
2. Add it to .env (or export it):

   OPENWEATHER_API_KEY="your-openweather-key"
`.trim(),
};
