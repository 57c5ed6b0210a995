#!/usr/bin/env node

/**
 * masqwatch CLI: brand-masquerade hunting on urlscan.io and Silent Push
 *
 * Usage:
 *   masqwatch run -c config.json -q usaa-domain
 *   masqwatch run -c config.json -g usaa-monitoring --tlp green,amber
 *   masqwatch run --all --days 3 --no-iocs
 *   masqwatch list -c config.yaml
 *   masqwatch report -c config.json -q usaa-domain -i output/<run>/raw_results.json
 *   masqwatch extract-gtm output/<run>
 */

import 'dotenv/config';

import { CommanderError } from 'commander';

import { errorMessage } from '../errors.js';
import { printError } from './options.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync();
  } catch (err) {
    // help and version exit through CommanderError
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
        return;
      }
      // commander has already printed its own message
      process.exitCode = err.exitCode || 1;
      return;
    }

    printError(errorMessage(err), 'Run "masqwatch --help" for usage information.');
    process.exitCode = 1;
  }
}

void main();
