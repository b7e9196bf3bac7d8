/**
 * Clocks
 *
 * Every clock returns seconds as a float.
 */

import { performance } from 'perf_hooks';
import type { Clock, ClockKind } from './types.js';

/**
 * Process CPU time (user + system)
 */
export const cpuClock: Clock = () => {
  const usage = process.cpuUsage();
  return (usage.user + usage.system) / 1e6;
};

export const wallClock: Clock = () => performance.now() / 1000;

/**
 * Clock that only moves when told to. Used for deterministic tests.
 */
export class ManualClock {
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  readonly now: Clock = () => this.current;

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(seconds: number): void {
    this.current = seconds;
  }
}

export function resolveClock(clock: Clock | ClockKind): Clock {
  if (typeof clock === 'function') {
    return clock;
  }
  return clock === 'wall' ? wallClock : cpuClock;
}
