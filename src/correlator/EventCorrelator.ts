/**
 * EventCorrelator
 *
 * Turns call/return events into per-function timings.
 *
 * Each record is Idle (depth 0) or Running (depth >= 1). Only the outermost
 * activation of a function is timed; its return overwrites the record's
 * duration, so the report shows the last completed call. Recursive calls add
 * to callCount without restarting the timer. A return with no matching call
 * still counts and leaves the duration unchanged.
 */

import type { ReportRegistry } from '../registry/ReportRegistry.js';
import type { CallSiteMetadata, Clock, InstrumentationHooks } from '../core/types.js';

export class EventCorrelator implements InstrumentationHooks {
  private registry: ReportRegistry;
  private clock: Clock;

  constructor(registry: ReportRegistry, clock: Clock) {
    this.registry = registry;
    this.clock = clock;
  }

  onCall(site: CallSiteMetadata): void {
    const report = this.registry.getOrCreate(site);
    if (report.depth === 0) {
      report.startedAt = this.clock();
    }
    report.depth += 1;
  }

  onReturn(site: CallSiteMetadata): void {
    // Timestamp before the registry lookup, mirroring onCall which stamps after it
    const now = this.clock();
    const report = this.registry.getOrCreate(site);

    if (report.depth > 0) {
      report.depth -= 1;
      if (report.depth === 0 && report.startedAt !== undefined) {
        report.duration = now - report.startedAt;
        report.startedAt = undefined;
      }
    }
    report.callCount += 1;
  }
}
