import { describe, it, expect, vi } from 'vitest';
import { formatSources, previewText, printAnswer } from '../answer-format.js';
import type { CommandContext } from '../../types.js';
import type { AnswerResult } from '../../../agent/index.js';

function createContext(): { ctx: CommandContext; logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  const ctx: CommandContext = {
    options: { verbose: false, json: false },
    log: (msg) => logs.push(msg),
    debug: vi.fn(),
    warn: vi.fn(),
    error: (msg) => errors.push(msg),
  };
  return { ctx, logs, errors };
}

describe('previewText', () => {
  it('collapses whitespace', () => {
    expect(previewText('  two\n\nlines\tand  tabs ')).toBe('two lines and tabs');
  });

  it('cuts long text with an ellipsis', () => {
    expect(previewText('abcdefghij', 8)).toBe('abcde...');
  });

  it('keeps text at exactly the limit', () => {
    expect(previewText('abcdefgh', 8)).toBe('abcdefgh');
  });
});

describe('formatSources', () => {
  it('numbers sources from 1', () => {
    expect(formatSources(['first chunk', 'second\nchunk'])).toEqual([
      '  [1] first chunk',
      '  [2] second chunk',
    ]);
  });
});

describe('printAnswer', () => {
  it('prints route, answer and sources', () => {
    const { ctx, logs, errors } = createContext();
    const result: AnswerResult = {
      route: 'WEATHER',
      answer: 'Bring an umbrella.',
      contextUsed: ['Leeds: 11°C, moderate rain'],
      error: null,
    };

    printAnswer(ctx, result);

    expect(errors).toEqual([]);
    expect(logs).toHaveLength(6);
    expect(logs[0]).toContain('Route: WEATHER');
    expect(logs.slice(1, 3)).toEqual(['', 'Bring an umbrella.']);
    expect(logs[4]).toContain('Sources:');
    expect(logs[5]).toBe('  [1] Leeds: 11°C, moderate rain');
  });

  it('omits the sources block when no context was used', () => {
    const { ctx, logs } = createContext();

    printAnswer(ctx, { route: 'RAG', answer: 'Nothing relevant.', contextUsed: [], error: null });

    expect(logs).toHaveLength(3);
    expect(logs[2]).toBe('Nothing relevant.');
  });

  it('prints only the error message on failure', () => {
    const { ctx, logs, errors } = createContext();

    printAnswer(ctx, {
      route: 'UNSUPPORTED',
      answer: '',
      contextUsed: [],
      error: { kind: 'NoIndexError', message: 'No document is indexed for session "s1"' },
    });

    expect(logs).toEqual([]);
    expect(errors).toEqual(['No document is indexed for session "s1"']);
  });
});
