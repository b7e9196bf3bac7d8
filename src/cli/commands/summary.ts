/**
 * Summary Command
 *
 * Print the top rows of a written report.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { readReportFile } from '../../report/ReportReader.js';

interface SummaryOptions {
  limit: string;
}

export const summaryCommand = new Command('summary')
  .description('Show the heaviest functions from a report file')
  .argument('<report>', 'Report file written by callprof')
  .option('-l, --limit <n>', 'Number of rows to show', '10')
  .action(async (reportPath: string, options: SummaryOptions) => {
    try {
      const rows = await readReportFile(reportPath);
      const limit = parseInt(options.limit, 10) || 10;

      console.log();
      console.log(chalk.cyan(`Profile Summary: ${reportPath}`));
      console.log(chalk.dim('─'.repeat(60)));

      if (rows.length === 0) {
        console.log(chalk.dim('No functions recorded'));
        console.log();
        return;
      }

      for (const row of rows.slice(0, limit)) {
        console.log(
          chalk.white(row.name.padEnd(30)),
          chalk.yellow(`${row.time.toFixed(3)}s`.padStart(10)),
          chalk.green(`${row.callCount} call(s)`.padStart(14)),
          chalk.dim(`${row.source}:${row.line}`)
        );
      }

      if (rows.length > limit) {
        console.log(chalk.dim(`... ${rows.length - limit} more`));
      }
      console.log();
    } catch (error) {
      console.error(chalk.red('Failed to read report'));
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
