/**
 * Core Types
 *
 * Shared type definitions for the call-accounting profiler.
 */

/**
 * Raw call-site metadata as delivered by an instrumentation mechanism.
 * Any field may be missing; see resolveCallSite() for the defaults.
 */
export interface CallSiteMetadata {
  /** Function display name */
  name?: string;
  /** Originating source file or module */
  source?: string;
  /** Line the function is defined at */
  definedAtLine?: number;
  /** True for functions implemented by the runtime rather than in source */
  isNative?: boolean;
}

/**
 * Call-site metadata with every default applied
 */
export interface ResolvedCallSite {
  source: string;
  name: string;
  definedAtLine: number;
}

/**
 * Accumulating record for one function identity
 */
export interface FunctionReport {
  /** Untruncated identity key */
  readonly key: string;
  /** Fixed-width display title (source : name : line) */
  readonly title: string;
  /** Completed call/return pairs */
  callCount: number;
  /** Duration of the last completed outermost activation, in seconds */
  duration: number;
  /** Clock reading when the outermost in-flight activation started */
  startedAt: number | undefined;
  /** Number of in-flight activations */
  depth: number;
}

export type SortMethod = 'duration' | 'count';

export type StartMode = 'normal' | 'once';

export type SessionState = 'reset' | 'active' | 'stopped';

/**
 * Returns elapsed time in seconds, monotonic for one session
 */
export type Clock = () => number;

export type ClockKind = 'cpu' | 'wall';

/**
 * Callbacks an instrumentation mechanism invokes for each delivered event
 */
export interface InstrumentationHooks {
  onCall(site: CallSiteMetadata): void;
  onReturn(site: CallSiteMetadata): void;
}

/**
 * Anything that can deliver call/return events to the profiler
 */
export interface InstrumentationMechanism {
  /** Whether hooks are currently installed */
  readonly installed: boolean;
  /**
   * Install hooks. Frequency 0 delivers every invocation, N > 0 every Nth.
   */
  install(hooks: InstrumentationHooks, frequency: number): void;
  uninstall(): void;
}
