/**
 * Index Progress
 *
 * Progress display while a document is chunked and embedded.
 * - Interactive: ora spinner with throttled updates
 * - Text: one line at start and end for non-TTY environments
 * - JSON: silent (the command prints its own result object)
 */

import { basename } from 'node:path';
import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IndexHandle } from '../../search/index.js';
import type { CommandContext } from '../types.js';

export interface IndexProgressOptions {
  /** Suppress all progress output */
  json: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * One-line summary of a finished index.
 */
export function formatIndexSummary(path: string, handle: IndexHandle): string {
  const chunks = handle.chunkCount === 1 ? 'chunk' : 'chunks';
  return `Indexed ${basename(path)}: ${handle.chunkCount} ${chunks}, ${handle.dimensions} dimensions`;
}

export class IndexProgress {
  private spinner: Ora | null = null;
  private lastUpdateTime = 0;

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(
    private readonly options: IndexProgressOptions,
    private readonly log: (message: string) => void
  ) {}

  start(path: string): void {
    if (this.options.json) {
      return;
    }
    const text = `Indexing ${basename(path)}...`;
    if (this.options.isInteractive) {
      this.spinner = ora({ text, prefixText: chalk.cyan('Index'.padEnd(8)) }).start();
    } else {
      this.log(text);
    }
  }

  update(embedded: number, total: number): void {
    if (!this.spinner) {
      return;
    }
    const now = performance.now();
    if (embedded < total && now - this.lastUpdateTime < IndexProgress.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;
    const percentage = total > 0 ? Math.round((embedded / total) * 100) : 100;
    this.spinner.text = `Embedding ${embedded}/${total} chunks (${percentage}%)`;
  }

  succeed(path: string, handle: IndexHandle): void {
    if (this.options.json) {
      return;
    }
    const summary = formatIndexSummary(path, handle);
    if (this.spinner) {
      this.spinner.succeed(summary);
      this.spinner = null;
    } else {
      this.log(`${chalk.green('✓')} ${summary}`);
    }
  }

  fail(path: string): void {
    this.spinner?.fail(`Failed to index ${basename(path)}`);
    this.spinner = null;
  }
}

/**
 * Run an indexing call with progress display.
 *
 * @example
 * ```typescript
 * const handle = await indexWithProgress(ctx, file, (onProgress) =>
 *   pipeline.indexFile(sessionId, file, { onProgress })
 * );
 * ```
 */
export async function indexWithProgress(
  ctx: CommandContext,
  path: string,
  run: (onProgress: (embedded: number, total: number) => void) => Promise<IndexHandle>
): Promise<IndexHandle> {
  const progress = new IndexProgress(
    { json: ctx.options.json, isInteractive: process.stdout.isTTY ?? false },
    ctx.log
  );

  progress.start(path);
  try {
    const handle = await run((embedded, total) => progress.update(embedded, total));
    progress.succeed(path, handle);
    return handle;
  } catch (error) {
    progress.fail(path);
    throw error;
  }
}
