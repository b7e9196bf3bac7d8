/**
 * ReportSorter
 *
 * Orders function reports before they are written.
 */

import type { FunctionReport, SortMethod } from '../core/types.js';

export type ReportComparator = (a: FunctionReport, b: FunctionReport) => number;

export const DEFAULT_SORT_METHOD: SortMethod = 'duration';

const COMPARATORS: Record<SortMethod, ReportComparator> = {
  duration: (a, b) => b.duration - a.duration,
  count: (a, b) => b.callCount - a.callCount
};

export function comparatorFor(method: SortMethod): ReportComparator {
  return COMPARATORS[method];
}

/**
 * Sorts in place and returns the same array. Order among ties is unspecified.
 */
export function sortReports(
  reports: FunctionReport[],
  method: SortMethod = DEFAULT_SORT_METHOD
): FunctionReport[] {
  return reports.sort(comparatorFor(method));
}
