#!/usr/bin/env node

import { Command, Option } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { runValidate } from './commands/validate.js';
import { REPORT_FORMATS } from './core/reporter.js';
import { VERSION } from './version.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('mrfcheck')
    .description('Validate hospital price-transparency machine-readable files')
    .version(VERSION);

  program
    .command('validate <path>')
    .description('Validate a tabular (CSV/TSV) or structured (JSON) file')
    .addOption(new Option('--format <format>', 'Report format').choices(REPORT_FORMATS).default('human'))
    .option('--out <path>', 'Write the report to a file instead of stdout')
    .option('--schema <variant>', 'Validate JSON against this schema instead of detecting one')
    .option('--max-rows <n>', 'Evaluate at most this many data rows')
    .option('--config <path>', 'Config file (default: ./mrfcheck.json5 when present)')
    .option('--no-env', 'Skip loading .env file')
    .action(async (path, options) => {
      try {
        process.exitCode = await runValidate(path, { ...options, noEnv: options.env === false });
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exitCode = 2;
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // missing or virtual argv path
}
if (isDirectRun) {
  buildProgram().parse();
}
