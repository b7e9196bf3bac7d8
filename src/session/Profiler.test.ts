/**
 * Profiler end-to-end tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Profiler } from './Profiler.js';
import { ManualClock } from '../core/clock.js';
import { DEFAULT_PROFILER_CONFIG } from '../core/config.js';
import { REPORT_HEADER } from '../report/ReportWriter.js';
import { parseReport } from '../report/ReportReader.js';

describe('Profiler', () => {
  let clock: ManualClock;
  let profiler: Profiler;
  let dir: string;

  beforeEach(() => {
    clock = new ManualClock();
    profiler = new Profiler({ clock: clock.now, quiet: true });
    dir = mkdtempSync(join(tmpdir(), 'callprof-e2e-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should report a function called three times', async () => {
    const f = profiler.wrap(function f() {
      clock.advance(0.25);
    }, { source: 'demo.ts', definedAtLine: 12 });
    const filePath = join(dir, 'ProFi.txt');

    profiler.start();
    f();
    f();
    f();
    profiler.stop();
    await profiler.writeReport(filePath);

    const title = 'demo.ts'.padEnd(50) + ': ' + 'f'.padEnd(40) + ': ' + '0012'.padEnd(20);
    expect(readFileSync(filePath, 'utf-8')).toBe(
      REPORT_HEADER + `| ${title}: ${'0.250'.padEnd(20)}: ${'0000003'.padEnd(20)}|\n`
    );
  });

  it('should sort the written report', async () => {
    const quick = profiler.wrap(() => clock.advance(0.1), { name: 'quick', source: 'demo.ts' });
    const slow = profiler.wrap(() => clock.advance(1), { name: 'slow', source: 'demo.ts' });
    const filePath = join(dir, 'sorted.txt');

    profiler.start();
    quick();
    quick();
    quick();
    slow();
    profiler.stop();

    await profiler.writeReport(filePath);
    expect(parseReport(readFileSync(filePath, 'utf-8')).map(row => row.name)).toEqual(['slow', 'quick']);

    profiler.setSortMethod('count');
    await profiler.writeReport(filePath);
    expect(parseReport(readFileSync(filePath, 'utf-8')).map(row => row.name)).toEqual(['quick', 'slow']);
  });

  it('should time recursive functions from their outermost call', () => {
    const countdown: (n: number) => number = profiler.wrap((n: number): number => {
      clock.advance(1);
      return n === 0 ? 0 : countdown(n - 1);
    }, { name: 'countdown', source: 'loop.ts', definedAtLine: 1 });

    profiler.start();
    countdown(3);
    profiler.stop();

    const report = profiler.findReport({ name: 'countdown', source: 'loop.ts', definedAtLine: 1 });
    expect(report?.callCount).toBe(4);
    expect(report?.duration).toBe(4);
    expect(report?.depth).toBe(0);
  });

  it('should stop counting after stop', () => {
    const tick = profiler.wrap(() => undefined, { name: 'tick', source: 'demo.ts' });

    profiler.start();
    tick();
    profiler.stop();
    tick();
    tick();

    expect(profiler.findReport({ name: 'tick', source: 'demo.ts' })?.callCount).toBe(1);
  });

  it('should recover timing after being stopped inside a wrapped call', () => {
    const job = profiler.wrap((stopInside: boolean) => {
      clock.advance(1);
      if (stopInside) {
        profiler.stop();
      }
    }, { name: 'job', source: 'jobs.ts' });

    profiler.start();
    job(true);
    profiler.start();
    job(false);
    job(false);
    profiler.stop();

    const report = profiler.findReport({ name: 'job', source: 'jobs.ts' });
    expect(report?.callCount).toBe(2);
    expect(report?.duration).toBe(1);
    expect(report?.depth).toBe(0);
  });

  it('should sample calls at the hook frequency', () => {
    const tick = profiler.wrap(() => undefined, { name: 'tick', source: 'demo.ts' });

    profiler.setHookFrequency(2);
    profiler.start();
    for (let i = 0; i < 6; i++) {
      tick();
    }
    profiler.stop();

    expect(profiler.findReport({ name: 'tick', source: 'demo.ts' })?.callCount).toBe(3);
  });

  it('should time async functions until they settle', async () => {
    const tracking = new Profiler({ clock: clock.now, quiet: true, trackAsync: true });
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const fetchAll = tracking.wrap(async () => {
      await gate;
    }, { name: 'fetchAll', source: 'net.ts' });

    tracking.start();
    const pending = fetchAll();
    clock.advance(2);
    release();
    await pending;
    tracking.stop();

    const report = tracking.findReport({ name: 'fetchAll', source: 'net.ts' });
    expect(report?.callCount).toBe(1);
    expect(report?.duration).toBe(2);
  });

  it('should wrap the functions of an object', () => {
    const math = profiler.wrapAll({
      square: (x: number) => x * x
    }, 'lib/math.ts');
    const square = math.square;

    profiler.start();
    if (typeof square === 'function') {
      Reflect.apply(square, undefined, [4]);
    }
    profiler.stop();

    expect(profiler.findReport({ name: 'square', source: 'lib/math.ts' })?.callCount).toBe(1);
  });

  it('should label sources with the calling file by default', () => {
    const tick = profiler.wrap(function tick() {});

    profiler.start();
    tick();
    profiler.stop();

    const [report] = profiler.getReports();
    expect(report.title).toContain('Profiler.test.ts');
  });

  it('should build from a config', () => {
    const configured = Profiler.fromConfig({
      ...DEFAULT_PROFILER_CONFIG,
      hookFrequency: 5,
      sortMethod: 'count'
    });

    expect(configured.getHookFrequency()).toBe(5);
    expect(configured.getSortMethod()).toBe('count');
  });
});
