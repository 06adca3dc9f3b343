/**
 * Document Path Validation
 *
 * Checks a user-supplied document path before indexing.
 * Used by the ask, index and chat commands (and /index in the REPL).
 */

import { extname, resolve } from 'node:path';
import { existsSync, statSync, realpathSync, accessSync, constants } from 'node:fs';

// ============================================================================
// Types
// ============================================================================

/** Document formats the loader can read */
export type DocumentFormat = 'pdf' | 'text';

/**
 * Result of path validation.
 *
 * Uses discriminated union to force callers to handle both success and failure.
 * Warnings are returned even on success for non-fatal issues.
 */
export type PathValidationResult =
  | {
      valid: true;
      normalizedPath: string;
      format: DocumentFormat;
      sizeBytes: number;
      warnings: string[];
    }
  | { valid: false; reason: 'not_found' | 'unsupported' | 'unreadable'; error: string; hint: string };

export interface PathValidationOptions {
  /** Files above this size are rejected (default: 50 MB) */
  maxBytes?: number;
  /** Whether to check read permissions (default: true) */
  checkReadable?: boolean;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;

/** Extension → format. Anything else is rejected. */
const SUPPORTED_EXTENSIONS: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.txt': 'text',
  '.md': 'text',
  '.markdown': 'text',
};

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a document path for indexing.
 *
 * Checks, in order: existence, symlink resolution, regular file,
 * supported extension, read permission, size limit.
 *
 * @example
 * const result = validateDocumentPath('./paper.pdf');
 * if (!result.valid) {
 *   throw new CLIError(result.error, result.hint);
 * }
 */
export function validateDocumentPath(
  inputPath: string,
  options: PathValidationOptions = {}
): PathValidationResult {
  const { maxBytes = DEFAULT_MAX_BYTES, checkReadable = true } = options;
  const warnings: string[] = [];

  const absolutePath = resolve(inputPath);

  if (!existsSync(absolutePath)) {
    return {
      valid: false,
      reason: 'not_found',
      error: `Path does not exist: ${absolutePath}`,
      hint: 'Check the path and try again. Use an absolute path to avoid ambiguity.',
    };
  }

  let realPath: string;
  try {
    realPath = realpathSync(absolutePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      valid: false,
      reason: 'unreadable',
      error: `Cannot resolve path: ${absolutePath}`,
      hint: `System error: ${message}`,
    };
  }

  const stat = statSync(realPath);
  if (!stat.isFile()) {
    return {
      valid: false,
      reason: 'unsupported',
      error: `Path is not a file: ${realPath}`,
      hint: 'Pass a single .pdf, .txt or .md document.',
    };
  }

  const format = SUPPORTED_EXTENSIONS[extname(realPath).toLowerCase()];
  if (!format) {
    return {
      valid: false,
      reason: 'unsupported',
      error: `Unsupported document type: ${extname(realPath) || '(no extension)'}`,
      hint: `Supported types: ${Object.keys(SUPPORTED_EXTENSIONS).join(', ')}`,
    };
  }

  if (checkReadable) {
    try {
      accessSync(realPath, constants.R_OK);
    } catch {
      return {
        valid: false,
        reason: 'unreadable',
        error: `Permission denied: cannot read ${realPath}`,
        hint: 'Check file permissions. You may need to run: chmod +r <path>',
      };
    }
  }

  if (stat.size > maxBytes) {
    return {
      valid: false,
      reason: 'unsupported',
      error: `Document too large: ${stat.size} bytes (limit ${maxBytes})`,
      hint: 'Split the document into smaller files.',
    };
  }

  if (stat.size === 0) {
    warnings.push(`Document is empty: ${realPath}`);
  }

  if (absolutePath !== realPath) {
    warnings.push(`Symlink resolved: ${absolutePath} -> ${realPath}`);
  }

  return {
    valid: true,
    normalizedPath: realPath,
    format,
    sizeBytes: stat.size,
    warnings,
  };
}
