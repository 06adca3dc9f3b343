/**
 * SkyDoc - Library Entry Point
 *
 * The CLI (`skydoc`) covers everyday use:
 * ```bash
 * skydoc ask "What is the weather in Berlin?"
 * skydoc ask "What is the main finding?" --doc paper.pdf
 * skydoc chat --doc notes.md
 * ```
 *
 * This module exports the answer pipeline and its parts for embedding
 * in other programs, with capabilities either built from configuration
 * or supplied by the caller.
 *
 * @example Pipeline from ~/.skydoc/config.toml and the environment
 * ```typescript
 * import { buildPipeline, loadConfig } from 'skydoc';
 *
 * const { pipeline } = await buildPipeline(loadConfig());
 * await pipeline.indexFile('session-1', './paper.pdf');
 * const result = await pipeline.answer('What is the main finding?', 'session-1');
 * await pipeline.endSession('session-1');
 * ```
 *
 * @example Caller-supplied capabilities
 * ```typescript
 * import { createPipeline, DEFAULT_CONFIG } from 'skydoc';
 *
 * const pipeline = createPipeline(DEFAULT_CONFIG, { completion, embedding, weather });
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './agent/index.js';
export * from './search/index.js';
export * from './indexer/index.js';
export * from './weather/index.js';
export * from './providers/index.js';
export * from './errors/index.js';
export * from './utils/index.js';

export {
  ConfigSchema,
  PartialConfigSchema,
  DEFAULT_CONFIG,
  DEFAULT_WEATHER_KEYWORDS,
  loadConfig,
  resolveConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getSkydocDir,
  getConfigPath,
  type Config,
  type PartialConfig,
} from './config/index.js';
