/**
 * Shared CLI option helpers for masqwatch commands.
 *
 * Provides reusable option registration functions, argument parsers and
 * the chalk print helpers used across all commands.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { InvalidArgumentError, type Command } from 'commander';
import chalk from 'chalk';

import { MasqwatchError } from '../errors.js';
import type { FetchFn } from '../platforms/types.js';
import { isTlpLevel } from '../tlp/redaction.js';
import type { TlpLevel } from '../types/config.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Seams the commands take from the entry point; tests replace them. */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export const DEFAULT_CONFIG_PATH = 'config.json';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

/**
 * Add the -c/--config option to a command.
 */
export function addConfigOption(cmd: Command): Command {
  return cmd.option('-c, --config <path>', 'Configuration file (JSON or YAML)', DEFAULT_CONFIG_PATH);
}

/**
 * Add the --tlp option to a command. Several levels produce one report each.
 */
export function addTlpOption(cmd: Command): Command {
  return cmd.option(
    '--tlp <levels>',
    'Report TLP ceiling(s), comma-separated: clear, white, green, amber, red',
    parseTlpLevels,
  );
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

/**
 * Parse a comma-separated list of TLP levels.
 *
 * @example parseTlpLevels('green,AMBER') => ['green', 'amber']
 * @throws {InvalidArgumentError} On an unknown level or an empty list.
 */
export function parseTlpLevels(value: string): TlpLevel[] {
  const levels: TlpLevel[] = [];
  for (const part of value.split(',')) {
    const level = part.trim().toLowerCase();
    if (level === '') continue;
    if (!isTlpLevel(level)) {
      throw new InvalidArgumentError(`Unknown TLP level "${level}". Valid levels: clear, white, green, amber, red`);
    }
    if (!levels.includes(level)) levels.push(level);
  }
  if (levels.length === 0) {
    throw new InvalidArgumentError('No TLP level given.');
  }
  return levels;
}

/**
 * Parse a positive whole number of days.
 *
 * @throws {InvalidArgumentError} On anything else.
 */
export function parseDays(value: string): number {
  const days = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(days) || days <= 0) {
    throw new InvalidArgumentError('Days must be a positive whole number.');
  }
  return days;
}

// ---------------------------------------------------------------------------
// Path resolution utilities
// ---------------------------------------------------------------------------

/**
 * Resolve and validate that an input file/directory exists.
 *
 * @throws {MasqwatchError} When the path does not exist.
 */
export function resolveInputPath(input: string): string {
  const resolved = resolve(input);
  if (!existsSync(resolved)) {
    throw new MasqwatchError(`Input path does not exist: ${resolved}`);
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Output helpers
// ---------------------------------------------------------------------------

/**
 * Print the bold command banner.
 */
export function printBanner(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  masqwatch — ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

/**
 * Print an informational message.
 */
export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}
