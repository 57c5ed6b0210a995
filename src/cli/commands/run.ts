/**
 * Run command: execute queries or query groups and write their reports.
 *
 * Exactly one selector is required: a query, a group, every query or
 * every group. `last_run` is advanced once at the end for the targets
 * that succeeded; the exit code is 1 when any target failed.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { QueryStore } from '../../config/query-store.js';
import { MasqwatchError } from '../../errors.js';
import { createClientProvider } from '../../platforms/index.js';
import { printSummary } from '../../reporting/summary-reporter.js';
import { QueryRunner } from '../../runner/orchestrator.js';
import { StatePersister } from '../../runner/state-persister.js';
import type { TlpLevel } from '../../types/config.js';
import {
  addConfigOption,
  addTlpOption,
  parseDays,
  printBanner,
  printInfo,
  printWarning,
  type CliDeps,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunCommandOptions {
  config: string;
  query?: string;
  group?: string;
  all?: boolean;
  allGroups?: boolean;
  days?: number;
  tlp?: TlpLevel[];
  iocs: boolean;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, deps: CliDeps = {}): void {
  const cmd = program
    .command('run')
    .description('Run queries or query groups and render their reports')
    .option('-q, --query <name>', 'Run a single query')
    .option('-g, --group <name>', 'Run a query group')
    .option('--all', 'Run every query')
    .option('--all-groups', 'Run every query group')
    .option('-d, --days <n>', 'Look back this many days, ignoring last_run', parseDays)
    .option('--no-iocs', 'Skip IOC extraction and export');
  addConfigOption(cmd);
  addTlpOption(cmd);

  cmd.action(async (options: RunCommandOptions) => {
    const failed = await runRun(options, deps);
    if (failed > 0) process.exitCode = 1;
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

/**
 * Select the target names for the given selector options.
 *
 * @throws {MasqwatchError} Unless exactly one selector is set, or when
 *   `--query` names a group.
 */
export function selectTargets(store: QueryStore, options: RunCommandOptions): string[] {
  const selectors = [options.query, options.group, options.all, options.allGroups].filter(
    (value) => value !== undefined && value !== false,
  );
  if (selectors.length !== 1) {
    throw new MasqwatchError('Specify exactly one of --query, --group, --all or --all-groups');
  }

  if (options.query !== undefined) {
    if (store.get(options.query).kind === 'group') {
      throw new MasqwatchError(`"${options.query}" is a query group; use --group`);
    }
    return [options.query];
  }
  if (options.group !== undefined) {
    if (store.get(options.group).kind === 'query') {
      throw new MasqwatchError(`"${options.group}" is a query, not a group; use --query`);
    }
    return [options.group];
  }
  return options.all ? store.queries().map((q) => q.name) : store.groups().map((g) => g.name);
}

/**
 * @returns The number of failed targets.
 */
export async function runRun(options: RunCommandOptions, deps: CliDeps = {}): Promise<number> {
  printBanner('Query Run');

  const loadSpinner = ora('Loading configuration...').start();
  let store: QueryStore;
  try {
    store = await QueryStore.load(options.config);
    loadSpinner.succeed(chalk.green(`Loaded ${store.names().length} entries from ${options.config}`));
  } catch (err) {
    loadSpinner.fail(chalk.red('Failed to load configuration'));
    throw err;
  }

  const targets = selectTargets(store, options);
  if (targets.length === 0) {
    printWarning('Nothing to run.');
    return 0;
  }

  printInfo(`Targets: ${targets.join(', ')}`);
  if (options.days !== undefined) printInfo(`Lookback override: ${options.days} day(s)`);
  if (options.tlp) printInfo(`TLP ceiling(s): ${options.tlp.join(', ')}`);
  console.log('');

  const runner = new QueryRunner({
    store,
    clients: createClientProvider({ env: deps.env, fetchFn: deps.fetchFn }),
    persister: new StatePersister(store),
    now: deps.now,
  });

  const summary = await runner.run(targets, {
    overrideDays: options.days ?? null,
    ceilings: options.tlp ?? [],
    extractIocs: options.iocs,
  });

  console.log('');
  printSummary(summary);
  console.log('');

  for (const outcome of summary.outcomes) {
    for (const report of outcome.reports) {
      printInfo(`Report: ${report}`);
    }
  }

  return summary.outcomes.filter((o) => o.status === 'failed').length;
}
