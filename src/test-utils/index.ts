/**
 * Test Utilities Module
 *
 * Fakes for the external capabilities, shared across test suites.
 *
 * @example
 * ```typescript
 * import { HashingEmbeddingProvider, RecordingCompletionProvider } from '../test-utils/index.js';
 *
 * const embedder = new HashingEmbeddingProvider(32);
 * const llm = new RecordingCompletionProvider('Paris.');
 * ```
 */

export {
  HashingEmbeddingProvider,
  RecordingCompletionProvider,
  StubWeatherProvider,
} from './fakes.js';
