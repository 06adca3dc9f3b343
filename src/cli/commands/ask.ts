/**
 * Ask Command
 *
 * One-shot question answering. Weather questions go to the live weather
 * lookup; anything else is answered from the document given with --doc.
 *
 *   skydoc ask "What is the weather in Berlin?"
 *   skydoc ask "What is the main contribution?" --doc ./paper.pdf
 *   skydoc ask "Summarize section 2" --doc notes.md --top-k 4 --json
 *
 * The document is indexed into a throwaway session that is dropped when
 * the command finishes.
 */

import { randomUUID } from 'node:crypto';
import { Command } from 'commander';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import type { Config } from '../../config/schema.js';
import { buildPipeline } from '../../agent/pipeline.js';
import { CLIError, exitCodeForKind } from '../../errors/index.js';
import { indexWithProgress } from '../utils/progress.js';
import { printAnswer } from '../utils/answer-format.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface AskCommandOptions {
  /** Document to index before answering */
  doc?: string;
  /** Chunks to retrieve (overrides retrieval.top_k) */
  topK?: string;
  /** LLM model override */
  model?: string;
}

// ============================================================================
// Constants
// ============================================================================

const MAX_TOP_K = 100;

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse and validate the --top-k option.
 *
 * @throws CLIError if not an integer in 1..MAX_TOP_K
 */
export function parseTopK(topKStr: string): number {
  const topK = Number(topKStr);

  if (!Number.isInteger(topK) || topK < 1) {
    throw new CLIError(
      `Invalid --top-k value: "${topKStr}"`,
      `Must be a positive integer (1-${MAX_TOP_K})`
    );
  }

  if (topK > MAX_TOP_K) {
    throw new CLIError(`--top-k value too large: ${topK}`, `Maximum allowed is ${MAX_TOP_K}`);
  }

  return topK;
}

function withTopK(config: Config, topK: number | undefined): Config {
  return topK === undefined ? config : { ...config, retrieval: { ...config.retrieval, top_k: topK } };
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the weather or about the document')
    .description('Ask a question about the weather or about a document')
    .option('-d, --doc <file>', 'Document to answer from (.pdf, .txt, .md)')
    .option('-k, --top-k <number>', 'Number of chunks to retrieve (default: retrieval.top_k)')
    .option('-m, --model <name>', 'LLM model to use instead of default_model')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: skydoc ask "What is the weather in Paris?"'
        );
      }

      const topK = cmdOptions.topK === undefined ? undefined : parseTopK(cmdOptions.topK);
      const config = withTopK(loadConfig(), topK);
      ctx.debug(`Question: "${trimmedQuestion}"`);
      ctx.debug(`Top-K: ${config.retrieval.top_k}`);

      const { pipeline, llm, embedding } = await buildPipeline(config, {
        logger: ctx,
        model: cmdOptions.model,
        fallback: {
          onFallback: (from, to, reason) => {
            ctx.debug(`LLM fallback: ${from} → ${to} (${reason})`);
          },
        },
      });
      ctx.debug(`Using LLM: ${llm.name}/${llm.model}`);
      ctx.debug(`Embedding: ${embedding.model} (${embedding.dimensions} dimensions)`);
      ctx.debug(`Vector store: ${pipeline.vectorStoreName}`);

      const sessionId = `ask-${randomUUID()}`;
      try {
        const doc = cmdOptions.doc;
        if (doc) {
          await indexWithProgress(ctx, doc, (onProgress) =>
            pipeline.indexFile(sessionId, doc, { onProgress })
          );
        }

        const result = await pipeline.answer(trimmedQuestion, sessionId);

        if (ctx.options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          printAnswer(ctx, result);
        }

        if (result.error) {
          process.exitCode = exitCodeForKind(result.error.kind);
        }
      } finally {
        await pipeline.endSession(sessionId);
      }
    });
}
