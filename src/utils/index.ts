/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Logger injected into library components
export {
  consoleLogger,
  silentLogger,
  withPrefix,
  type Logger,
} from './logger.js';

// Document path checks for the CLI
export {
  validateDocumentPath,
  type DocumentFormat,
  type PathValidationResult,
  type PathValidationOptions,
} from './path-validation.js';
