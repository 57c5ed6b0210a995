/**
 * Report command: render reports again from a stored `raw_results.json`.
 *
 * No API is called and `last_run` is left untouched. Reports are written
 * beside the results file.
 */

import { dirname } from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { QueryStore } from '../../config/query-store.js';
import { QueryResolver, uniqueLeaves } from '../../query/resolver.js';
import { hydrateResults, readRawResults } from '../../runner/raw-results.js';
import { writeReports } from '../../runner/report-writer.js';
import type { TlpLevel } from '../../types/config.js';
import {
  addConfigOption,
  addTlpOption,
  printBanner,
  printInfo,
  printWarning,
  resolveInputPath,
  type CliDeps,
} from '../options.js';

interface ReportCommandOptions {
  config: string;
  query: string;
  input: string;
  tlp?: TlpLevel[];
}

export function registerReportCommand(program: Command, deps: CliDeps = {}): void {
  const cmd = program
    .command('report')
    .description('Re-render reports from a saved raw_results.json without querying any API')
    .requiredOption('-q, --query <name>', 'Query or group the results belong to')
    .requiredOption('-i, --input <path>', 'Path to raw_results.json');
  addConfigOption(cmd);
  addTlpOption(cmd);

  cmd.action(async (options: ReportCommandOptions) => {
    await runReport(options, deps);
  });
}

/**
 * @returns Paths of the written reports.
 */
export async function runReport(options: ReportCommandOptions, deps: CliDeps = {}): Promise<string[]> {
  printBanner('Offline Report');

  const inputPath = resolveInputPath(options.input);
  const store = await QueryStore.load(options.config);
  const entry = store.get(options.query);
  const leaves = uniqueLeaves(new QueryResolver(store).resolve(entry.name)).map((leaf) => leaf.query);

  const file = await readRawResults(inputPath);
  if (file.name !== entry.name) {
    printWarning(`Results were produced for "${file.name}", rendering them as "${entry.name}"`);
  }

  const spinner = ora('Rendering reports...').start();
  try {
    const results = await hydrateResults(file, inputPath);
    const reports = await writeReports({
      store,
      entry,
      leaves,
      results,
      runDir: dirname(inputPath),
      ceilings: options.tlp ?? [],
      generatedAt: (deps.now ?? (() => new Date()))(),
    });
    spinner.succeed(chalk.green(`Rendered ${reports.length} report(s) from ${results.length} result(s)`));
    for (const report of reports) printInfo(report);
    return reports;
  } catch (err) {
    spinner.fail(chalk.red('Rendering failed'));
    throw err;
  }
}
