/**
 * List command: show configured queries and groups.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { QueryStore } from '../../config/query-store.js';
import { highestTlpLevel, tlpLabel } from '../../tlp/redaction.js';
import type { QueryEntry, TlpLevel } from '../../types/config.js';
import { addConfigOption, printBanner } from '../options.js';

interface ListOptions {
  config: string;
}

const TLP_COLORS: Record<TlpLevel, (text: string) => string> = {
  clear: chalk.white,
  white: chalk.white,
  green: chalk.green,
  amber: chalk.yellow,
  red: chalk.red,
};

export function registerListCommand(program: Command): void {
  const cmd = program.command('list').description('List configured queries and query groups');
  addConfigOption(cmd);
  cmd.action(async (options: ListOptions) => {
    const store = await QueryStore.load(options.config);
    printBanner('Configured Queries');
    console.log(formatListing(store));
  });
}

/** Highest level across the entry's metadata and, for queries, the query string. */
export function entryTlpLevel(entry: QueryEntry): TlpLevel {
  return highestTlpLevel(entry.metadata, entry.kind === 'query' ? [entry.query.tlp] : []);
}

export function formatListing(store: QueryStore): string {
  const lines: string[] = [];
  const describe = (entry: QueryEntry): string => {
    const level = entryTlpLevel(entry);
    const parts = [
      `  ${chalk.bold(entry.name)} ${TLP_COLORS[level](`[${tlpLabel(level)}]`)}`,
      entry.kind === 'query'
        ? chalk.gray(`    ${entry.platform}: ${entry.query.value}`)
        : chalk.gray(`    members: ${entry.queries.join(', ')}`),
    ];
    if (entry.metadata.description) parts.push(`    ${entry.metadata.description.value}`);
    if (entry.lastRun) parts.push(chalk.gray(`    last run: ${entry.lastRun}`));
    return parts.join('\n');
  };

  const queries = store.queries();
  const groups = store.groups();

  lines.push(chalk.bold.cyan(`Queries (${queries.length})`));
  lines.push(...(queries.length > 0 ? queries.map(describe) : [chalk.gray('  none')]));
  lines.push('');
  lines.push(chalk.bold.cyan(`Query groups (${groups.length})`));
  lines.push(...(groups.length > 0 ? groups.map(describe) : [chalk.gray('  none')]));
  return lines.join('\n');
}
