/**
 * Startup Configuration Validation
 *
 * Validates API keys and configuration at CLI startup.
 * Provides early warnings for misconfigurations to avoid wasted time.
 *
 * IMPORTANT: This is a WARNING system, not a hard block.
 * Commands that don't need an LLM or embeddings still work.
 */

import chalk from 'chalk';
import { loadConfig } from './loader.js';
import { validateProviderKey } from '../providers/validation.js';
import { getEnv, hasApiKey, SETUP_INSTRUCTIONS } from './env.js';
import type { Config } from './schema.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether all required settings are valid */
  valid: boolean;
  /** Warning messages (non-fatal issues) */
  warnings: string[];
  /** Error messages (will prevent some features) */
  errors: string[];
  /** Hint messages with setup instructions */
  hints: string[];
}

/**
 * Options for startup validation.
 */
export interface StartupValidationOptions {
  /** Config to check; loaded from ~/.skydoc/config.toml when omitted */
  config?: Config;
  /** Skip LLM provider validation (for commands that don't need an LLM) */
  skipLLM?: boolean;
  /** Skip embedding and vector store validation */
  skipEmbedding?: boolean;
  /** Skip the weather key check */
  skipWeather?: boolean;
}

interface Issue {
  severity: 'error' | 'warning';
  message: string;
  hint?: string;
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate configuration at CLI startup.
 *
 * Checks:
 * 1. Default LLM provider key (or Ollama host)
 * 2. Embedding provider key (or Ollama host / endpoint)
 * 3. Qdrant URL when the qdrant vector store is selected
 * 4. OpenWeatherMap key (warning only: document questions still work)
 *
 * Returns warnings/errors rather than throwing to allow partial functionality.
 *
 * @example
 * const result = validateStartupConfig(getValidationOptionsForCommand('ask'));
 * printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { skipLLM = false, skipEmbedding = false, skipWeather = false } = options;
  const issues: Issue[] = [];

  let config = options.config;
  if (!config) {
    try {
      config = loadConfig(false);
    } catch (error) {
      return collect([
        {
          severity: 'error',
          message: error instanceof Error ? error.message : String(error),
        },
      ]);
    }
  }

  if (!skipLLM) {
    issues.push(...checkLLMProvider(config));
  }
  if (!skipEmbedding) {
    issues.push(...checkEmbeddingProvider(config), ...checkVectorStore(config));
  }
  if (!skipWeather && !hasApiKey('openweather')) {
    issues.push({
      severity: 'warning',
      message: 'OPENWEATHER_API_KEY is not set; weather questions will fail',
      hint: SETUP_INSTRUCTIONS.openweather,
    });
  }

  return collect(issues);
}

function collect(issues: Issue[]): StartupValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  return {
    valid: errors.length === 0,
    errors: errors.map((i) => i.message),
    warnings: issues.filter((i) => i.severity === 'warning').map((i) => i.message),
    hints: errors.flatMap((i) => (i.hint ? [i.hint] : [])),
  };
}

function checkLLMProvider(config: Config): Issue[] {
  const provider = config.default_provider;
  const validation = validateProviderKey(provider);
  if (validation.valid) {
    return [];
  }
  return [
    {
      severity: 'error',
      message: `LLM provider '${provider}': ${validation.error}`,
      hint: validation.setupInstructions,
    },
  ];
}

function checkEmbeddingProvider(config: Config): Issue[] {
  const provider = config.embedding.provider;
  const validation = validateProviderKey(provider);
  if (validation.valid) {
    return [];
  }
  return [
    {
      severity: 'error',
      message: `Embedding provider '${provider}': ${validation.error}`,
      hint: validation.setupInstructions,
    },
  ];
}

function checkVectorStore(config: Config): Issue[] {
  if (config.vector_store.provider !== 'qdrant') {
    return [];
  }
  if (getEnv('QDRANT_URL') ?? config.vector_store.url) {
    return [];
  }
  return [
    {
      severity: 'error',
      message: 'Vector store "qdrant" is selected but no Qdrant URL is set',
      hint: 'Set QDRANT_URL, or run: skydoc config set vector_store.provider memory',
    },
  ];
}

/**
 * Print startup validation warnings/errors to console.
 *
 * @param verbose - Whether to show warnings too (default: only errors)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(`  ${hint}`));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that require LLM functionality.
 */
export const COMMANDS_REQUIRING_LLM = ['ask', 'chat'];

/**
 * Commands that embed text (indexing or querying a document).
 */
export const COMMANDS_REQUIRING_EMBEDDING = ['ask', 'index', 'chat'];

/**
 * Commands that may look up the weather.
 */
export const COMMANDS_REQUIRING_WEATHER = ['ask', 'chat'];

/**
 * Validation options for a command.
 *
 * @param command - Command name (e.g., 'ask', 'config')
 */
export function getValidationOptionsForCommand(command: string): StartupValidationOptions {
  return {
    skipLLM: !COMMANDS_REQUIRING_LLM.includes(command),
    skipEmbedding: !COMMANDS_REQUIRING_EMBEDDING.includes(command),
    skipWeather: !COMMANDS_REQUIRING_WEATHER.includes(command),
  };
}
