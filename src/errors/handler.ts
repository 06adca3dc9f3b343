/**
 * Error Reporting
 *
 * Every failure the CLI prints goes through one ErrorReport, so the text
 * and JSON renderings always agree on kind, exit code and hint. Pipeline
 * failures report their PipelineErrorKind; other CLI errors report their
 * class name.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';
import {
  PipelineError,
  UpstreamCapabilityError,
  exitCodeForKind,
  type Capability,
} from './pipeline.js';

export interface ErrorHandlerOptions {
  /** Add cause and stack trace */
  verbose?: boolean;
  /** Render the report as JSON */
  json?: boolean;
}

/**
 * What the CLI knows about a failure, independent of how it is printed.
 */
export interface ErrorReport {
  /** PipelineErrorKind, CLI error class name, or "Error" */
  kind: string;
  message: string;
  /** Process exit code */
  code: number;
  hint?: string;
  /** Set for UpstreamCapabilityError */
  capability?: Capability;
  cause?: string;
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * Build the report for any thrown value.
 */
export function describeError(error: unknown, verbose = false): ErrorReport {
  if (!(error instanceof Error)) {
    return { kind: 'Error', message: String(error), code: 1 };
  }

  const report: ErrorReport = {
    kind: error instanceof PipelineError ? error.kind : error.name,
    message: error.message,
    code: getExitCode(error),
  };

  if (error instanceof CLIError) {
    report.hint = error.hint;
  } else if (!verbose) {
    report.hint = VERBOSE_HINT;
  }
  if (error instanceof UpstreamCapabilityError) {
    report.capability = error.capability;
  }
  if (verbose) {
    if (error.cause instanceof Error) {
      report.cause = error.cause.message;
    }
    report.stack = error.stack;
  }
  return report;
}

/**
 * Exit code for a thrown value: the pipeline kind's code for pipeline
 * failures, the CLIError's own code otherwise, 1 for anything else.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof PipelineError) {
    return exitCodeForKind(error.kind);
  }
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Render a report as terminal text, e.g.
 *
 * ```
 * ✗ [NoIndexError] No document is indexed for session "s1"
 *   hint: Index a document first, ...
 * ```
 */
export function renderReport(report: ErrorReport): string {
  const lines = [`${chalk.red('✗')} ${chalk.bold(`[${report.kind}]`)} ${report.message}`];

  if (report.capability) {
    lines.push(chalk.dim(`  capability: ${report.capability}`));
  }
  if (report.cause) {
    lines.push(chalk.dim(`  cause: ${report.cause}`));
  }
  if (report.hint) {
    lines.push(chalk.dim(`  hint: ${report.hint}`));
  }
  if (report.stack) {
    lines.push('', chalk.dim(report.stack));
  }
  return lines.join('\n');
}

/**
 * Format an error as text or JSON. Does not exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const report = describeError(error, options.verbose ?? false);
  return options.json ? JSON.stringify(report, null, 2) : renderReport(report);
}

/**
 * Print an error to stderr and return its exit code.
 * Commands that set process.exitCode instead of exiting use this.
 */
export function reportError(error: unknown, options: ErrorHandlerOptions = {}): number {
  console.error(formatError(error, options));
  return getExitCode(error);
}

/**
 * Print an error and exit the process.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  process.exit(reportError(error, options));
}

/**
 * Handler for process 'uncaughtException' and 'unhandledRejection'.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
