/**
 * ReportWriter
 *
 * Renders function reports into the fixed-width text format and writes
 * them to disk, replacing any existing file.
 */

import { open, type FileHandle } from 'fs/promises';
import { ReportWriteError } from '../core/errors.js';
import { formatFixed, padColumn, zeroPad } from './format.js';
import {
  LINE_COLUMN_WIDTH,
  NAME_COLUMN_WIDTH,
  SOURCE_COLUMN_WIDTH
} from '../identity/FunctionIdentity.js';
import type { FunctionReport } from '../core/types.js';

export const TIME_COLUMN_WIDTH = 20;
export const CALLED_COLUMN_WIDTH = 20;

export const REPORT_HEADER =
  '| ' +
  [
    padColumn('FILE', SOURCE_COLUMN_WIDTH),
    padColumn('FUNCTION', NAME_COLUMN_WIDTH),
    padColumn('LINE', LINE_COLUMN_WIDTH),
    padColumn('TIME', TIME_COLUMN_WIDTH),
    padColumn('CALLED', CALLED_COLUMN_WIDTH)
  ].join(': ') +
  '|\n';

/**
 * One report line: `| <title>: <time %04.3f>: <count %07d>|`
 */
export function formatReportLine(report: FunctionReport): string {
  const time = padColumn(formatFixed(report.duration, 4, 3), TIME_COLUMN_WIDTH);
  const called = padColumn(zeroPad(report.callCount, 7), CALLED_COLUMN_WIDTH);
  return `| ${report.title}: ${time}: ${called}|\n`;
}

export function renderReport(reports: readonly FunctionReport[]): string {
  let output = REPORT_HEADER;
  for (const report of reports) {
    output += formatReportLine(report);
  }
  return output;
}

/**
 * Write reports to `filePath` in the given order. The handle is closed on
 * every path; open, write and close failures all reject with
 * ReportWriteError, the first failure winning.
 */
export async function writeReportFile(
  filePath: string,
  reports: readonly FunctionReport[]
): Promise<void> {
  const content = renderReport(reports);

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'w');
  } catch (error) {
    throw new ReportWriteError(filePath, error);
  }

  let failure: ReportWriteError | undefined;
  try {
    await handle.writeFile(content, 'utf-8');
  } catch (error) {
    failure = new ReportWriteError(filePath, error);
  }

  try {
    await handle.close();
  } catch (error) {
    failure ??= new ReportWriteError(filePath, error);
  }

  if (failure) {
    throw failure;
  }
}
