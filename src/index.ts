/**
 * callprof - Call-accounting profiler
 *
 * Correlates function call and return events into per-function call
 * counts and timings, and writes them as a sorted fixed-width report.
 */

// Session exports
export { Profiler } from './session/Profiler.js';
export type { ProfilerOptions } from './session/Profiler.js';
export { ProfilerSession } from './session/ProfilerSession.js';
export type { ProfilerSessionOptions } from './session/ProfilerSession.js';

// Accounting exports
export { EventCorrelator } from './correlator/EventCorrelator.js';
export { ReportRegistry } from './registry/ReportRegistry.js';
export { sortReports, comparatorFor, DEFAULT_SORT_METHOD } from './aggregation/ReportSorter.js';
export type { ReportComparator } from './aggregation/ReportSorter.js';
export {
  resolveCallSite,
  identityKey,
  formatTitle,
  ANONYMOUS_NAME,
  NATIVE_SOURCE
} from './identity/FunctionIdentity.js';

// Instrumentation exports
export {
  WrapInstrumentation,
  describeFunction,
  isNativeFunction
} from './instrumentation/WrapInstrumentation.js';
export type { WrapInstrumentationOptions } from './instrumentation/WrapInstrumentation.js';
export {
  parseStackLine,
  captureCallerFrame,
  frameAt,
  shortSource
} from './instrumentation/FrameInspector.js';
export type { StackFrame } from './instrumentation/FrameInspector.js';

// Report exports
export {
  REPORT_HEADER,
  formatReportLine,
  renderReport,
  writeReportFile
} from './report/ReportWriter.js';
export { parseReport, readReportFile } from './report/ReportReader.js';
export type { ReportRow } from './report/ReportReader.js';

// Core exports
export { cpuClock, wallClock, ManualClock, resolveClock } from './core/clock.js';
export {
  loadConfigFromEnv,
  mergeConfig,
  validateConfig,
  DEFAULT_PROFILER_CONFIG,
  DEFAULT_REPORT_PATH
} from './core/config.js';
export type { ProfilerConfig } from './core/config.js';
export { ReportWriteError, ProfilerConfigError } from './core/errors.js';
export type {
  CallSiteMetadata,
  ResolvedCallSite,
  FunctionReport,
  SortMethod,
  StartMode,
  SessionState,
  Clock,
  ClockKind,
  InstrumentationHooks,
  InstrumentationMechanism
} from './core/types.js';
