/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.skydoc)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import type { AnyJson, JsonMap } from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getSkydocDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  );
}

function isJsonMap(value: AnyJson | undefined): value is JsonMap {
  return isPlainObject(value);
}

/**
 * Ensure the ~/.skydoc directory exists
 */
function ensureSkydocDir(): void {
  const dir = getSkydocDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

/**
 * Deep merge two objects, with source values overriding target.
 * Nested objects merge; arrays and primitives replace.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = target[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function formatIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Merge user values over the defaults and validate the result.
 *
 * @throws ConfigError if the merged config is invalid
 */
export function resolveConfig(userConfig: unknown, source = 'config'): Config {
  const partial = PartialConfigSchema.safeParse(userConfig ?? {});
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(partial.error)}`,
      `Fix the values in ${getConfigPath()} or delete the file to restore defaults`
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(merged.error)}`,
      `Fix the values in ${getConfigPath()} or delete the file to restore defaults`
    );
  }

  return merged.data;
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, creates default config on first run
 * @throws ConfigError if config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureSkydocDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return resolveConfig({});
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: JsonMap;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or delete it to restore defaults`
    );
  }

  return resolveConfig(parsed, configPath);
}

/**
 * Walk a dot-notation path through an object.
 */
function readPath(root: unknown, key: string): unknown {
  let current: unknown = root;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('embedding.model') => 'nomic-embed-text'
 */
export function getConfigValue(key: string): unknown {
  return readPath(loadConfig(), key);
}

/**
 * Set a specific config value by dot-notation path
 * Writes the change back to the config file
 */
export function setConfigValue(key: string, value: string): void {
  const parts = key.split('.').filter(Boolean);
  const section = parts[0];
  const lastPart = parts[parts.length - 1];

  if (section === undefined || lastPart === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: skydoc config list  to see available keys'
    );
  }

  if (!(section in ConfigSchema.shape)) {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: skydoc config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureSkydocDir();

  // Load existing config or start fresh
  let config: JsonMap = {};
  if (fs.existsSync(configPath)) {
    config = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  // Arrays (e.g. router.weather_keywords) are given comma-separated
  const parsedValue = Array.isArray(readPath(DEFAULT_CONFIG, key))
    ? value.split(',').map((v) => v.trim()).filter(Boolean)
    : parseValue(value);

  // Set the value at the nested path
  let current = config;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isJsonMap(next)) {
      current = next;
    } else {
      const created: JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parsedValue;

  // Validate the complete config before saving
  resolveConfig(config, `'${key}'`);

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, and strings
 */
function parseValue(value: string): boolean | number | string {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['default_model', 'llama-3.1-8b-instant']
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: PlainObject, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(loadConfig());
  return entries;
}
