/**
 * ReportRegistry Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ReportRegistry } from './ReportRegistry.js';

describe('ReportRegistry', () => {
  let registry: ReportRegistry;

  beforeEach(() => {
    registry = new ReportRegistry();
  });

  it('should return the same record for identical call sites', () => {
    const first = registry.getOrCreate({ name: 'parse', source: 'lib/parse.ts', definedAtLine: 10 });
    const second = registry.getOrCreate({ name: 'parse', source: 'lib/parse.ts', definedAtLine: 10 });

    expect(second).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('should create zero-valued records', () => {
    const report = registry.getOrCreate({ name: 'parse', source: 'lib/parse.ts', definedAtLine: 10 });

    expect(report.callCount).toBe(0);
    expect(report.duration).toBe(0);
    expect(report.startedAt).toBeUndefined();
    expect(report.depth).toBe(0);
    expect(report.title.startsWith('lib/parse.ts')).toBe(true);
  });

  it('should treat missing fields and their defaults as one identity', () => {
    const a = registry.getOrCreate({});
    const b = registry.getOrCreate({ name: 'anonymous', source: '[native]', definedAtLine: 0 });

    expect(b).toBe(a);
  });

  it('should keep records in insertion order', () => {
    registry.getOrCreate({ name: 'c', source: 'x.ts' });
    registry.getOrCreate({ name: 'a', source: 'x.ts' });
    registry.getOrCreate({ name: 'b', source: 'x.ts' });
    registry.getOrCreate({ name: 'a', source: 'x.ts' });

    expect(registry.reports.map(r => r.title.slice(52, 53))).toEqual(['c', 'a', 'b']);
  });

  it('should find existing records without creating new ones', () => {
    registry.getOrCreate({ name: 'a', source: 'x.ts' });

    expect(registry.get({ name: 'a', source: 'x.ts' })).toBeDefined();
    expect(registry.get({ name: 'b', source: 'x.ts' })).toBeUndefined();
    expect(registry.size).toBe(1);
  });

  it('should sort the ordered list in place', () => {
    const few = registry.getOrCreate({ name: 'few', source: 'x.ts' });
    const many = registry.getOrCreate({ name: 'many', source: 'x.ts' });
    few.callCount = 1;
    many.callCount = 9;

    const sorted = registry.sortBy('count');

    expect(sorted).toEqual([many, few]);
    expect(registry.reports[0]).toBe(many);
  });

  it('should forget everything on reset', () => {
    const before = registry.getOrCreate({ name: 'a', source: 'x.ts' });
    registry.reset();

    expect(registry.size).toBe(0);
    expect(registry.reports).toEqual([]);
    expect(registry.getOrCreate({ name: 'a', source: 'x.ts' })).not.toBe(before);
  });

  it('should return in-flight records to idle and keep their totals', () => {
    const report = registry.getOrCreate({ name: 'a', source: 'x.ts' });
    report.callCount = 2;
    report.duration = 1.5;
    report.depth = 1;
    report.startedAt = 4;

    registry.clearInFlight();

    expect(report.depth).toBe(0);
    expect(report.startedAt).toBeUndefined();
    expect(report.callCount).toBe(2);
    expect(report.duration).toBe(1.5);
  });
});
