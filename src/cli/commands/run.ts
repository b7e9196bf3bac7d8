/**
 * Run Command
 *
 * Profile a module: wrap its exported functions, call its entry export,
 * and write the report.
 *
 * Only calls that go through the module's exports are observed; calls the
 * module makes to its own functions internally bypass the wrappers.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { pathToFileURL } from 'url';
import chalk from 'chalk';
import ora from 'ora';
import { Profiler } from '../../session/Profiler.js';
import { shortSource } from '../../instrumentation/FrameInspector.js';
import {
  ClockKindSchema,
  SortMethodSchema,
  loadConfigFromEnv,
  mergeConfig
} from '../../core/config.js';
import type { StartMode } from '../../core/types.js';

interface RunOptions {
  entry: string;
  output?: string;
  sort?: string;
  frequency?: string;
  clock?: string;
  async?: boolean;
  once?: boolean;
}

export const runCommand = new Command('run')
  .description('Profile the exported functions of a module while running its entry export')
  .argument('<module>', 'Path to the module to profile')
  .option('-e, --entry <name>', 'Exported function to run', 'default')
  .option('-o, --output <path>', 'Report file path')
  .option('-s, --sort <method>', 'Sort by duration or count')
  .option('-f, --frequency <n>', 'Sample every Nth call (0 = every call)')
  .option('-c, --clock <kind>', 'cpu or wall')
  .option('--async', 'Time promise-returning functions until they settle')
  .option('--once', 'Start in run-once mode')
  .action(async (modulePath: string, options: RunOptions) => {
    const spinner = ora(`Profiling ${modulePath}...`).start();

    try {
      const config = mergeConfig(loadConfigFromEnv(), {
        reportPath: options.output,
        sortMethod: options.sort === undefined ? undefined : SortMethodSchema.parse(options.sort),
        hookFrequency: options.frequency === undefined ? undefined : Number(options.frequency),
        clock: options.clock === undefined ? undefined : ClockKindSchema.parse(options.clock),
        trackAsync: options.async,
        quiet: true
      });

      const absolutePath = resolve(modulePath);
      const namespace: unknown = await import(pathToFileURL(absolutePath).href);
      if (!isRecord(namespace)) {
        throw new Error(`Module ${modulePath} has no exports`);
      }

      const profiler = Profiler.fromConfig(config);
      const exports = profiler.wrapAll(namespace, shortSource(absolutePath));
      const entry = exports[options.entry];
      if (typeof entry !== 'function') {
        throw new Error(`Export "${options.entry}" of ${modulePath} is not a function`);
      }

      const mode: StartMode = options.once ? 'once' : 'normal';
      profiler.start(mode);
      try {
        const result: unknown = Reflect.apply(entry, undefined, []);
        await result;
      } finally {
        profiler.stop();
      }

      await profiler.writeReport();
      spinner.succeed(chalk.green(`Report written to ${config.reportPath}`));

      const reports = profiler.getReports();
      console.log(chalk.dim(`${reports.length} function(s) recorded`));
    } catch (error) {
      spinner.fail(chalk.red('Profiling failed'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
