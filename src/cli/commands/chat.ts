/**
 * Chat Command
 *
 * Interactive REPL over one session. Weather questions work at any time;
 * document questions need a document indexed with --doc or /index.
 *
 *   skydoc chat                       # Start without a document
 *   skydoc chat --doc ./paper.pdf     # Index a document first
 *
 * REPL Commands:
 *   /help        - Show available commands
 *   /index FILE  - Index FILE, replacing the current document
 *   /clear       - Drop the current document
 *   /status      - Show model, vector store and document details
 *   /exit        - Exit the chat (also: exit, quit)
 */

import * as readline from 'node:readline';
import { randomUUID } from 'node:crypto';
import { basename } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { buildPipeline, type AnswerPipeline } from '../../agent/pipeline.js';
import { CLIError } from '../../errors/index.js';
import { indexWithProgress } from '../utils/progress.js';
import { printAnswer } from '../utils/answer-format.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface ChatCommandOptions {
  /** Document to index before the first prompt */
  doc?: string;
  /** LLM model override */
  model?: string;
}

/**
 * Mutable state for the chat REPL session.
 * Persists across user inputs within a single session.
 */
export interface ChatState {
  pipeline: AnswerPipeline;
  /** Session the document index belongs to */
  sessionId: string;
  /** Provider metadata for display */
  providerInfo: { name: string; model: string };
  /** Path of the indexed document (null = weather only) */
  document: string | null;
  /** Readline interface for prompt updates (set after REPL starts) */
  rl?: readline.Interface;
}

interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  usage?: string;
  /** Returns false to end the REPL */
  handler: (args: string[], state: ChatState, ctx: CommandContext) => Promise<boolean>;
}

// ============================================================================
// Helpers
// ============================================================================

function getPrompt(state: ChatState): string {
  const doc = state.document ? chalk.blue(`[${basename(state.document)}] `) : '';
  return `${doc}${chalk.cyan('skydoc>')} `;
}

function updatePrompt(state: ChatState): void {
  state.rl?.setPrompt(getPrompt(state));
}

function reportError(ctx: CommandContext, error: unknown): void {
  if (error instanceof CLIError) {
    ctx.error(error.message);
    if (error.hint) {
      ctx.log(chalk.dim(error.hint));
    }
  } else {
    ctx.error(`Failed to process input: ${error instanceof Error ? error.message : String(error)}`);
  }
}

// ============================================================================
// REPL Commands
// ============================================================================

const EXIT_COMMAND: REPLCommand = {
  name: 'exit',
  aliases: ['quit', 'q'],
  description: 'Exit the chat',
  handler: async (_args, _state, ctx) => {
    ctx.log(chalk.dim('Goodbye!'));
    return false;
  },
};

const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: async (_args, _state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      ctx.log('');
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0
            ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`)
            : '';
        const usageStr = cmd.usage ? ` ${chalk.cyan(cmd.usage)}` : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${usageStr}${aliasStr}`);
        ctx.log(`    ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Type any other text to ask a question.'));
      ctx.log('');
      return true;
    },
  },
  {
    name: 'index',
    aliases: ['i'],
    description: 'Index a document, replacing the current one',
    usage: '<file>',
    handler: async (args, state, ctx) => {
      const path = args.join(' ');
      if (!path) {
        ctx.error('Usage: /index <file>');
        return true;
      }
      await indexWithProgress(ctx, path, (onProgress) =>
        state.pipeline.indexFile(state.sessionId, path, { onProgress })
      );
      state.document = path;
      updatePrompt(state);
      return true;
    },
  },
  {
    name: 'clear',
    aliases: [],
    description: 'Drop the current document',
    handler: async (_args, state, ctx) => {
      const hadIndex = await state.pipeline.endSession(state.sessionId);
      state.document = null;
      updatePrompt(state);
      ctx.log(hadIndex ? 'Document cleared.' : 'No document is indexed.');
      return true;
    },
  },
  {
    name: 'status',
    aliases: ['s'],
    description: 'Show model, vector store and document details',
    handler: async (_args, state, ctx) => {
      const handle = state.pipeline.getHandle(state.sessionId);
      ctx.log(`Model:        ${state.providerInfo.name}/${state.providerInfo.model}`);
      ctx.log(`Vector store: ${state.pipeline.vectorStoreName}`);
      if (handle && state.document) {
        ctx.log(`Document:     ${state.document}`);
        ctx.log(
          `Index:        ${handle.chunkCount} chunks, ${handle.dimensions} dimensions, generation ${handle.generation}`
        );
      } else {
        ctx.log('Document:     none');
      }
      return true;
    },
  },
  EXIT_COMMAND,
];

/**
 * Parse user input to detect REPL commands.
 * Returns null if it's a regular question.
 *
 * @internal Exported for testing purposes
 */
export function parseREPLCommand(
  input: string
): { command: REPLCommand; args: string[] } | null {
  const trimmed = input.trim();

  // "exit" or "quit" without slash
  if (/^(exit|quit)$/i.test(trimmed)) {
    return { command: EXIT_COMMAND, args: [] };
  }

  if (!trimmed.startsWith('/')) {
    return null;
  }

  // Parse "/command arg1 arg2"
  const parts = trimmed.slice(1).split(/\s+/);
  const cmdName = parts[0]?.toLowerCase() ?? '';
  const args = parts.slice(1);

  const command = REPL_COMMANDS.find(
    (c) => c.name === cmdName || c.aliases.includes(cmdName)
  );

  if (!command) {
    return null; // Unknown command, treat as question
  }

  return { command, args };
}

/**
 * Handle one line of REPL input: a command or a question.
 * Errors are printed, never thrown.
 *
 * @returns false when the REPL should end
 */
export async function handleChatInput(
  input: string,
  state: ChatState,
  ctx: CommandContext
): Promise<boolean> {
  const trimmed = input.trim();
  if (!trimmed) {
    return true;
  }

  try {
    const replCmd = parseREPLCommand(trimmed);
    if (replCmd) {
      return await replCmd.command.handler(replCmd.args, state, ctx);
    }

    const result = await state.pipeline.answer(trimmed, state.sessionId);
    printAnswer(ctx, result);
    ctx.log('');
  } catch (error) {
    reportError(ctx, error);
  }
  return true;
}

function displayWelcome(state: ChatState, ctx: CommandContext): void {
  ctx.log('');
  ctx.log(chalk.bold('SkyDoc Chat'));
  ctx.log(chalk.dim(`Model: ${state.providerInfo.name}/${state.providerInfo.model}`));
  ctx.log('');
  if (state.document) {
    ctx.log(chalk.blue(`Document: ${state.document}`));
  } else {
    ctx.log(chalk.dim('No document indexed. Ask about the weather, or use /index <file>.'));
  }
  ctx.log('');
  ctx.log(chalk.dim('Type /help for commands, "exit" to quit'));
  ctx.log('');
}

/**
 * Main REPL loop using readline.
 *
 * Lines are handled one at a time in arrival order, so piped input
 * works too. The session's index is dropped when the REPL ends.
 */
async function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: getPrompt(state),
  });
  state.rl = rl;

  let isClosed = false;
  const closed = new Promise<void>((resolve) => {
    rl.on('close', () => {
      isClosed = true;
      resolve();
    });
  });

  let pending: Promise<boolean> = Promise.resolve(true);

  rl.on('line', (line) => {
    pending = pending.then(async (keepGoing) => {
      if (!keepGoing) {
        return false;
      }
      const next = await handleChatInput(line, state, ctx);
      if (isClosed) {
        return next;
      }
      if (next) {
        rl.prompt();
      } else {
        rl.close();
      }
      return next;
    });
  });

  rl.on('SIGINT', () => {
    ctx.log('');
    ctx.log(chalk.dim('Goodbye!'));
    rl.close();
  });

  displayWelcome(state, ctx);
  rl.prompt();

  await closed;
  await pending;
  await state.pipeline.endSession(state.sessionId);
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the chat command.
 *
 * @param getContext - Factory to get command context with global options
 */
export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive chat about the weather and a document')
    .option('-d, --doc <file>', 'Document to index before the first question')
    .option('-m, --model <name>', 'LLM model to use instead of default_model')
    .action(async (cmdOptions: ChatCommandOptions) => {
      const ctx = getContext();

      ctx.debug('Starting chat session...');
      const config = loadConfig();

      const { pipeline, llm } = await buildPipeline(config, {
        logger: ctx,
        model: cmdOptions.model,
        fallback: {
          onFallback: (from, to, reason) => {
            ctx.debug(`LLM fallback: ${from} → ${to} (${reason})`);
          },
        },
      });
      ctx.debug(`Using: ${llm.name}/${llm.model}`);

      const state: ChatState = {
        pipeline,
        sessionId: `chat-${randomUUID()}`,
        providerInfo: { name: llm.name, model: llm.model },
        document: null,
      };

      const doc = cmdOptions.doc;
      if (doc) {
        await indexWithProgress(ctx, doc, (onProgress) =>
          pipeline.indexFile(state.sessionId, doc, { onProgress })
        );
        state.document = doc;
      }

      await runChatREPL(state, ctx);
    });
}
