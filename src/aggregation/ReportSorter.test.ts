import { describe, it, expect } from 'vitest';
import { comparatorFor, sortReports } from './ReportSorter.js';
import type { FunctionReport } from '../core/types.js';

function makeReport(name: string, duration: number, count: number): FunctionReport {
  return {
    key: name,
    title: name,
    callCount: count,
    duration,
    startedAt: undefined,
    depth: 0
  };
}

describe('sortReports', () => {
  const fixtures = (): FunctionReport[] => [
    makeReport('a', 0.5, 10),
    makeReport('b', 2.0, 1),
    makeReport('c', 1.0, 5)
  ];

  it('should order by duration, longest first', () => {
    const sorted = sortReports(fixtures(), 'duration');
    expect(sorted.map(r => r.duration)).toEqual([2.0, 1.0, 0.5]);
  });

  it('should order by call count, most first', () => {
    const sorted = sortReports(fixtures(), 'count');
    expect(sorted.map(r => r.callCount)).toEqual([10, 5, 1]);
  });

  it('should default to duration', () => {
    expect(sortReports(fixtures()).map(r => r.title)).toEqual(['b', 'c', 'a']);
  });

  it('should sort in place', () => {
    const reports = fixtures();
    expect(sortReports(reports, 'count')).toBe(reports);
  });

  it('should leave an empty list empty', () => {
    expect(sortReports([], 'count')).toEqual([]);
  });

  it('should expose comparators by method', () => {
    const slow = makeReport('slow', 3, 1);
    const fast = makeReport('fast', 1, 7);

    expect(comparatorFor('duration')(slow, fast)).toBeLessThan(0);
    expect(comparatorFor('count')(slow, fast)).toBeGreaterThan(0);
  });
});
