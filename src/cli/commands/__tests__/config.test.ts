/**
 * Tests for config command
 *
 * Runs get/set/list/path against a temporary SKYDOC_HOME.
 * Colours are switched off so lines can be compared exactly.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { createConfigCommand, renderSections } from '../config.js';
import type { CommandContext } from '../../types.js';

describe('createConfigCommand', () => {
  let home: string;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  const colorLevel = chalk.level;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'skydoc-config-cmd-'));
    vi.stubEnv('SKYDOC_HOME', home);

    chalk.level = 0;
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    chalk.level = colorLevel;
    vi.unstubAllEnvs();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    process.exitCode = undefined;
    fs.rmSync(home, { recursive: true, force: true });
  });

  async function runCommand(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createConfigCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'config', ...args]);
  }

  it('registers get, set, list and path', () => {
    const names = createConfigCommand(() => mockContext).commands.map((c) => c.name());

    expect(names).toEqual(['get', 'set', 'list', 'path']);
  });

  describe('path', () => {
    it('prints the config file location', async () => {
      await runCommand(['path']);

      expect(logOutput).toEqual([path.join(home, 'config.toml')]);
    });
  });

  describe('get', () => {
    it('prints a default value', async () => {
      await runCommand(['get', 'embedding.model']);

      expect(logOutput).toEqual(['nomic-embed-text']);
    });

    it('prints lists as JSON', async () => {
      await runCommand(['set', 'router.weather_keywords', 'weather,rain']);
      logOutput.length = 0;

      await runCommand(['get', 'router.weather_keywords']);

      expect(logOutput).toEqual(['["weather","rain"]']);
    });

    it('reports an unknown key as a ConfigError', async () => {
      await runCommand(['get', 'retrieval.depth']);

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        '✗ [ConfigError] Unknown config key: retrieval.depth\n' +
          '  hint: Run: skydoc config list  to see available keys'
      );
      expect(process.exitCode).toBe(2);
    });

    it('prints the error report as JSON with --json', async () => {
      mockContext.options.json = true;

      await runCommand(['get', 'retrieval.depth']);

      const report = JSON.parse(String(consoleErrorSpy.mock.calls[0]?.[0]));
      expect(report).toEqual({
        kind: 'ConfigError',
        message: 'Unknown config key: retrieval.depth',
        code: 2,
        hint: 'Run: skydoc config list  to see available keys',
      });
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it('prints key and value as JSON with --json', async () => {
      mockContext.options.json = true;

      await runCommand(['get', 'retrieval.top_k']);

      expect(consoleLogSpy).toHaveBeenCalledWith('{"key":"retrieval.top_k","value":8}');
    });
  });

  describe('set', () => {
    it('writes the value to the config file', async () => {
      await runCommand(['set', 'weather.units', 'imperial']);
      expect(logOutput).toEqual(['✓ weather.units = imperial']);
      logOutput.length = 0;

      await runCommand(['get', 'weather.units']);

      expect(logOutput).toEqual(['imperial']);
      expect(fs.readFileSync(path.join(home, 'config.toml'), 'utf-8')).toContain('units = "imperial"');
    });

    it('reports a rejected value with the config exit code', async () => {
      await runCommand(['set', 'retrieval.top_k', '0']);

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      expect(String(consoleErrorSpy.mock.calls[0]?.[0])).toMatch(/^✗ \[ConfigError\] .*retrieval\.top_k/);
      expect(process.exitCode).toBe(2);
    });

    it('reports unknown sections', async () => {
      await runCommand(['set', 'search.top_k', '3']);

      expect(String(consoleErrorSpy.mock.calls[0]?.[0])).toBe(
        '✗ [ConfigError] Unknown config key: search.top_k\n' +
          '  hint: Run: skydoc config list  to see available keys'
      );
      expect(process.exitCode).toBe(2);
    });
  });

  describe('list', () => {
    it('prints keys under their section and the config file path', async () => {
      await runCommand(['list']);

      const section = logOutput.indexOf('[chunking]');
      expect(section).toBeGreaterThanOrEqual(0);
      expect(logOutput.slice(section + 1, section + 3)).toEqual([
        'chunk_size = 800',
        'chunk_overlap = 100',
      ]);
      expect(logOutput[logOutput.length - 1]).toBe(`# ${path.join(home, 'config.toml')}`);
    });

    it('prints an object with --json', async () => {
      mockContext.options.json = true;

      await runCommand(['list']);

      const printed = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(printed['retrieval.top_k']).toBe(8);
      expect(printed['weather.units']).toBe('metric');
    });
  });
});

describe('renderSections', () => {
  const colorLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = colorLevel;
  });

  it('puts top-level keys first and one block per section', () => {
    const lines = renderSections([
      ['retrieval.top_k', 8],
      ['default_provider', 'ollama'],
      ['router.weather_keywords', ['rain', 'snow']],
      ['retrieval.min_score', 0.2],
    ]);

    expect(lines).toEqual([
      'default_provider = ollama',
      '',
      '[retrieval]',
      'top_k = 8',
      'min_score = 0.2',
      '',
      '[router]',
      'weather_keywords = ["rain","snow"]',
    ]);
  });
});
