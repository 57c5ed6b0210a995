/**
 * Command tree for the masqwatch CLI.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';

import { registerExtractGtmCommand } from './commands/extract-gtm.js';
import { registerListCommand } from './commands/list.js';
import { registerReportCommand } from './commands/report.js';
import { registerRunCommand } from './commands/run.js';
import type { CliDeps } from './options.js';

const PackageSchema = z.object({ version: z.string() });

function packageVersion(): string {
  const path = fileURLToPath(new URL('../../package.json', import.meta.url));
  return PackageSchema.parse(JSON.parse(readFileSync(path, 'utf-8'))).version;
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('masqwatch')
    .description('Scheduled urlscan.io and Silent Push queries rendered into TLP-marked HTML reports')
    .version(packageVersion())
    // Errors surface to the caller instead of exiting; subcommands inherit this
    .exitOverride();

  // Register all commands
  registerRunCommand(program, deps);
  registerListCommand(program);
  registerReportCommand(program, deps);
  registerExtractGtmCommand(program, deps);

  return program;
}
