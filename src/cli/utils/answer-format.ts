/**
 * Answer Formatting
 *
 * Text rendering of an AnswerResult for ask and chat.
 */

import chalk from 'chalk';
import type { AnswerResult } from '../../agent/index.js';
import type { CommandContext } from '../types.js';

const PREVIEW_LENGTH = 100;

/**
 * Collapse whitespace and cut to `maxLength` characters.
 */
export function previewText(text: string, maxLength = PREVIEW_LENGTH): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 3)}...` : flat;
}

/**
 * Numbered source lines, e.g. `  [1] Attention is a mechanism...`
 */
export function formatSources(contextUsed: string[]): string[] {
  return contextUsed.map((text, i) => `  [${i + 1}] ${previewText(text)}`);
}

/**
 * Print route, answer and sources, or the recorded failure.
 */
export function printAnswer(ctx: CommandContext, result: AnswerResult): void {
  if (result.error) {
    ctx.error(result.error.message);
    return;
  }

  ctx.log(chalk.dim(`Route: ${result.route ?? 'none'}`));
  ctx.log('');
  ctx.log(result.answer);

  if (result.contextUsed.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    for (const line of formatSources(result.contextUsed)) {
      ctx.log(line);
    }
  }
}
