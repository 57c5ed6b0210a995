/**
 * Extract-gtm command: Google Tag Manager IDs from the urlscan.io DOMs
 * of a finished run.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { runGtmExtraction, type GtmExtractionResult } from '../../runner/gtm-extension.js';
import { printBanner, printInfo, resolveInputPath, type CliDeps } from '../options.js';

interface ExtractGtmOptions {
  cache: boolean;
}

export function registerExtractGtmCommand(program: Command, deps: CliDeps = {}): void {
  program
    .command('extract-gtm')
    .description('Extract Google Tag Manager IDs from the urlscan.io DOMs of a run directory')
    .argument('<runDir>', 'Run output directory containing iocs/*scan_ids.csv')
    .option('--no-cache', 'Always download DOMs instead of using extensions/dom_cache')
    .action(async (runDir: string, options: ExtractGtmOptions) => {
      await runExtractGtm(runDir, options, deps);
    });
}

export async function runExtractGtm(
  runDir: string,
  options: ExtractGtmOptions,
  deps: CliDeps = {},
): Promise<GtmExtractionResult> {
  printBanner('GTM Extraction');
  const resolved = resolveInputPath(runDir);

  const spinner = ora('Fetching scan DOMs...').start();
  try {
    const result = await runGtmExtraction({ runDir: resolved, useCache: options.cache, fetchFn: deps.fetchFn });
    spinner.succeed(chalk.green(`Scanned ${result.scanned} DOM(s), ${result.matches.size} with GTM IDs`));
    printInfo(`Output: ${result.outputPath}`);
    return result;
  } catch (err) {
    spinner.fail(chalk.red('GTM extraction failed'));
    throw err;
  }
}
