/**
 * Profiler
 *
 * A ProfilerSession driven by function wrapping.
 *
 * @example
 * ```ts
 * const profiler = new Profiler();
 * const parse = profiler.wrap(parseDocument);
 * profiler.start();
 * parse(input);
 * profiler.stop();
 * await profiler.writeReport('parse-profile.txt');
 * ```
 */

import { ProfilerSession, type ProfilerSessionOptions } from './ProfilerSession.js';
import { WrapInstrumentation } from '../instrumentation/WrapInstrumentation.js';
import { callerSourceLabel } from '../instrumentation/FrameInspector.js';
import type { ProfilerConfig } from '../core/config.js';
import type { CallSiteMetadata } from '../core/types.js';

export interface ProfilerOptions extends ProfilerSessionOptions {
  trackAsync?: boolean;
}

export class Profiler extends ProfilerSession {
  readonly instrumentation: WrapInstrumentation;

  constructor(options: ProfilerOptions = {}) {
    const instrumentation = new WrapInstrumentation({ trackAsync: options.trackAsync });
    super(instrumentation, options);
    this.instrumentation = instrumentation;
  }

  static fromConfig(config: ProfilerConfig): Profiler {
    return new Profiler({
      clock: config.clock,
      hookFrequency: config.hookFrequency,
      sortMethod: config.sortMethod,
      reportPath: config.reportPath,
      quiet: config.quiet,
      trackAsync: config.trackAsync
    });
  }

  wrap<A extends unknown[], R>(
    fn: (...args: A) => R,
    hints: CallSiteMetadata = {}
  ): (this: unknown, ...args: A) => R {
    return this.instrumentation.wrap(fn, {
      ...hints,
      source: hints.source ?? callerSourceLabel()
    });
  }

  wrapAll(target: Record<string, unknown>, source?: string): Record<string, unknown> {
    return this.instrumentation.wrapAll(target, source ?? callerSourceLabel());
  }
}
