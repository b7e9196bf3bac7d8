/**
 * ReportReader
 *
 * Parses a written report back into rows.
 */

import { readFile } from 'fs/promises';

export interface ReportRow {
  source: string;
  name: string;
  line: number;
  time: number;
  callCount: number;
}

// Source and name columns are fixed width in code points; the rest are padded but may overflow
const ROW_PATTERN = /^\| (.{50}): (.{40}): (\S+)\s*: (\S+)\s*: (\S+)\s*\|$/u;

export function parseReport(content: string): ReportRow[] {
  const rows: ReportRow[] = [];
  const lines = content.split('\n');

  // First line is the header
  for (const line of lines.slice(1)) {
    const match = line.match(ROW_PATTERN);
    if (!match) {
      continue;
    }
    rows.push({
      source: match[1].trimEnd(),
      name: match[2].trimEnd(),
      line: parseInt(match[3], 10),
      time: parseFloat(match[4]),
      callCount: parseInt(match[5], 10)
    });
  }
  return rows;
}

export async function readReportFile(filePath: string): Promise<ReportRow[]> {
  return parseReport(await readFile(filePath, 'utf-8'));
}
