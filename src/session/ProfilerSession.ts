/**
 * ProfilerSession
 *
 * Owns the start/stop/reset lifecycle of one profiling session.
 *
 * States: reset -> active -> stopped, plus the run-once guard. A session
 * started with 'once' ignores further start('once') and stop() calls after
 * its first completed cycle, until reset().
 */

import { EventCorrelator } from '../correlator/EventCorrelator.js';
import { ReportRegistry } from '../registry/ReportRegistry.js';
import { writeReportFile } from '../report/ReportWriter.js';
import { resolveClock } from '../core/clock.js';
import { DEFAULT_PROFILER_CONFIG, HookFrequencySchema } from '../core/config.js';
import { ProfilerConfigError } from '../core/errors.js';
import type {
  CallSiteMetadata,
  Clock,
  ClockKind,
  FunctionReport,
  InstrumentationMechanism,
  SessionState,
  SortMethod,
  StartMode
} from '../core/types.js';

export interface ProfilerSessionOptions {
  clock?: Clock | ClockKind;
  hookFrequency?: number;
  sortMethod?: SortMethod;
  reportPath?: string;
  /** Suppress log output */
  quiet?: boolean;
}

export class ProfilerSession {
  private mechanism: InstrumentationMechanism;
  private registry: ReportRegistry = new ReportRegistry();
  private correlator: EventCorrelator;

  private hookFrequency: number;
  private sortMethod: SortMethod;
  private reportPath: string;
  private quiet: boolean;

  private _state: SessionState = 'reset';
  private finished: boolean = false;
  private runOnceArmed: boolean = false;

  constructor(mechanism: InstrumentationMechanism, options: ProfilerSessionOptions = {}) {
    this.mechanism = mechanism;
    this.correlator = new EventCorrelator(
      this.registry,
      resolveClock(options.clock ?? DEFAULT_PROFILER_CONFIG.clock)
    );
    this.hookFrequency = checkHookFrequency(options.hookFrequency ?? DEFAULT_PROFILER_CONFIG.hookFrequency);
    this.sortMethod = options.sortMethod ?? DEFAULT_PROFILER_CONFIG.sortMethod;
    this.reportPath = options.reportPath ?? DEFAULT_PROFILER_CONFIG.reportPath;
    this.quiet = options.quiet ?? DEFAULT_PROFILER_CONFIG.quiet;
  }

  get state(): SessionState {
    return this._state;
  }

  /**
   * Start profiling. In 'once' mode this is a no-op after the first
   * completed start/stop cycle.
   */
  start(mode: StartMode = 'normal'): void {
    if (mode === 'once') {
      if (this.shouldSkip()) {
        return;
      }
      this.runOnceArmed = true;
    }

    this.finished = false;
    if (this._state !== 'active') {
      this.registry.clearInFlight();
      this.mechanism.install(this.correlator, this.hookFrequency);
      this._state = 'active';
    }
  }

  stop(): void {
    if (this.shouldSkip() || this._state !== 'active') {
      return;
    }
    this.mechanism.uninstall();
    this._state = 'stopped';
    this.finished = true;
  }

  /**
   * Discard all records and the run-once guard. Hook frequency and sort
   * method are kept; an active session stays active.
   */
  reset(): void {
    this.registry.reset();
    this.finished = false;
    this.runOnceArmed = false;
    if (this._state === 'stopped') {
      this._state = 'reset';
    }
  }

  /**
   * Sample every Nth call (0 = every call). Applies from the next start().
   */
  setHookFrequency(frequency: number): void {
    this.hookFrequency = checkHookFrequency(frequency);
  }

  getHookFrequency(): number {
    return this.hookFrequency;
  }

  setSortMethod(method: SortMethod): void {
    this.sortMethod = method;
  }

  getSortMethod(): SortMethod {
    return this.sortMethod;
  }

  /**
   * Records ordered by the current sort method
   */
  getReports(): readonly FunctionReport[] {
    return this.registry.sortBy(this.sortMethod);
  }

  findReport(site: CallSiteMetadata): FunctionReport | undefined {
    return this.registry.get(site);
  }

  async writeReport(filePath: string = this.reportPath): Promise<void> {
    await writeReportFile(filePath, this.getReports());
    if (!this.quiet) {
      console.log(`[Profiler] Report written to ${filePath}`);
    }
  }

  private shouldSkip(): boolean {
    return this.runOnceArmed && this.finished;
  }
}

function checkHookFrequency(frequency: number): number {
  const parsed = HookFrequencySchema.safeParse(frequency);
  if (!parsed.success) {
    throw new ProfilerConfigError([
      `hookFrequency must be a non-negative integer (got ${frequency})`
    ]);
  }
  return parsed.data;
}
