/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `skydoc config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  EmbeddingConfigSchema,
  ChunkingConfigSchema,
  VectorStoreConfigSchema,
  WeatherConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, EmbeddingConfig, LLMProviderType } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, DEFAULT_WEATHER_KEYWORDS, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveConfig,
  deepMerge,
  getConfigValue,
  setConfigValue,
  listConfig,
} from './loader.js';

// Paths (resolved per call so SKYDOC_HOME can change)
export { getSkydocDir, getConfigPath } from './paths.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasApiKey,
  getOllamaHost,
  getOpenAICompatibleConfig,
  isOpenAICompatibleConfigured,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, KeyedProvider } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_LLM,
  COMMANDS_REQUIRING_EMBEDDING,
  COMMANDS_REQUIRING_WEATHER,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
