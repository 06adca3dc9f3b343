/**
 * Error handling module for the SkyDoc CLI
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: skydoc config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
} from './types.js';

// Pipeline failures
export {
  PipelineError,
  PipelineErrorKinds,
  EmptyDocumentError,
  NoIndexError,
  UnroutableQueryError,
  LocationNotFoundError,
  EmbeddingDimensionMismatchError,
  UpstreamCapabilityError,
  callCapability,
  exitCodeForKind,
  type PipelineErrorKind,
  type Capability,
} from './pipeline.js';

// Error handling utilities
export {
  describeError,
  renderReport,
  formatError,
  getExitCode,
  reportError,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorReport,
} from './handler.js';
