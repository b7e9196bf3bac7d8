#!/usr/bin/env node
/**
 * callprof CLI
 *
 * Command-line interface for the call-accounting profiler.
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { runCommand } from './commands/run.js';
import { summaryCommand } from './commands/summary.js';

loadDotenv();

const program = new Command();

program
  .name('callprof')
  .description('Per-function call counts and timings')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(summaryCommand);

await program.parseAsync();
