/**
 * Config Command
 *
 *   skydoc config get <key>          - print one value
 *   skydoc config set <key> <value>  - validate and write one value
 *   skydoc config list               - print every value, grouped by section
 *   skydoc config path               - print the config file location
 *
 * List values such as router.weather_keywords are set comma-separated.
 * Failures go through reportError, so `--json` gives the same ErrorReport
 * as every other command and the exit code follows the error kind.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigValue, setConfigValue, listConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';
import { ConfigError, reportError } from '../../errors/index.js';

/** JSON payload for --json, and the lines printed otherwise */
interface ConfigOutput {
  json: unknown;
  text: () => string[];
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const run = <A extends string[]>(action: (...args: A) => ConfigOutput) => (...args: A) => {
    const ctx = getContext();
    try {
      const output = action(...args);
      if (ctx.options.json) {
        console.log(JSON.stringify(output.json));
      } else {
        output.text().forEach((line) => ctx.log(line));
      }
    } catch (error) {
      process.exitCode = reportError(error, ctx.options);
    }
  };

  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., skydoc config get embedding.model)')
    .action(
      run((key: string) => {
        const value = getConfigValue(key);
        if (value === undefined) {
          throw new ConfigError(
            `Unknown config key: ${key}`,
            'Run: skydoc config list  to see available keys'
          );
        }
        return { json: { key, value }, text: () => [renderValue(value)] };
      })
    );

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., skydoc config set retrieval.top_k 4)')
    .action(
      run((key: string, raw: string) => {
        setConfigValue(key, raw);
        const value = getConfigValue(key);
        return {
          json: { key, value },
          text: () => [`${chalk.green('✓')} ${chalk.cyan(key)} = ${chalk.yellow(renderValue(value))}`],
        };
      })
    );

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(
      run(() => {
        const entries = listConfig();
        return {
          json: Object.fromEntries(entries),
          text: () => [...renderSections(entries), '', chalk.dim(`# ${getConfigPath()}`)],
        };
      })
    );

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(
      run(() => {
        const configPath = getConfigPath();
        return { json: { path: configPath }, text: () => [configPath] };
      })
    );

  return configCmd;
}

function renderValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * TOML-style listing: top-level keys first, then one `[section]` block per
 * section with keys relative to it.
 */
export function renderSections(entries: ReadonlyArray<[string, unknown]>): string[] {
  const sections = new Map<string, Array<[string, unknown]>>();
  for (const [key, value] of entries) {
    const dot = key.indexOf('.');
    const section = dot === -1 ? '' : key.slice(0, dot);
    const rest = dot === -1 ? key : key.slice(dot + 1);
    const bucket = sections.get(section) ?? [];
    bucket.push([rest, value]);
    sections.set(section, bucket);
  }

  const lines: string[] = [];
  const ordered = [...sections].sort(([a], [b]) => (a === '' ? -1 : b === '' ? 1 : 0));
  for (const [section, keys] of ordered) {
    if (section !== '') {
      if (lines.length > 0) lines.push('');
      lines.push(chalk.bold(`[${section}]`));
    }
    for (const [key, value] of keys) {
      lines.push(`${chalk.cyan(key)} = ${chalk.yellow(renderValue(value))}`);
    }
  }
  return lines;
}
