/**
 * Configuration
 *
 * Default configuration and environment variable loading for callprof.
 *
 * Environment variables:
 * - CALLPROF_HOOK_FREQUENCY: sample every Nth call, 0 = every call (default: 0)
 * - CALLPROF_SORT_METHOD: duration | count (default: duration)
 * - CALLPROF_REPORT_PATH: report file (default: ProFi.txt)
 * - CALLPROF_CLOCK: cpu | wall (default: cpu)
 * - CALLPROF_TRACK_ASYNC: time promise-returning functions until settled (default: false)
 * - CALLPROF_QUIET: suppress log output (default: false)
 */

import { z } from 'zod';
import { ProfilerConfigError } from './errors.js';
import type { ClockKind, SortMethod } from './types.js';

export interface ProfilerConfig {
  hookFrequency: number;
  sortMethod: SortMethod;
  reportPath: string;
  clock: ClockKind;
  trackAsync: boolean;
  quiet: boolean;
}

export const DEFAULT_REPORT_PATH = 'ProFi.txt';

export const DEFAULT_PROFILER_CONFIG: Readonly<ProfilerConfig> = {
  hookFrequency: 0,
  sortMethod: 'duration',
  reportPath: DEFAULT_REPORT_PATH,
  clock: 'cpu',
  trackAsync: false,
  quiet: false
};

export const HookFrequencySchema = z.number().int().nonnegative();

export const SortMethodSchema = z.enum(['duration', 'count']);

export const ClockKindSchema = z.enum(['cpu', 'wall']);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  CALLPROF_HOOK_FREQUENCY: z.coerce.number().pipe(HookFrequencySchema).optional(),
  CALLPROF_SORT_METHOD: SortMethodSchema.optional(),
  CALLPROF_REPORT_PATH: z.string().min(1).optional(),
  CALLPROF_CLOCK: ClockKindSchema.optional(),
  CALLPROF_TRACK_ASYNC: booleanFlag.optional(),
  CALLPROF_QUIET: booleanFlag.optional()
});

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ProfilerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ProfilerConfigError(formatIssues(parsed.error));
  }

  const vars = parsed.data;
  return {
    hookFrequency: vars.CALLPROF_HOOK_FREQUENCY ?? DEFAULT_PROFILER_CONFIG.hookFrequency,
    sortMethod: vars.CALLPROF_SORT_METHOD ?? DEFAULT_PROFILER_CONFIG.sortMethod,
    reportPath: vars.CALLPROF_REPORT_PATH ?? DEFAULT_PROFILER_CONFIG.reportPath,
    clock: vars.CALLPROF_CLOCK ?? DEFAULT_PROFILER_CONFIG.clock,
    trackAsync: vars.CALLPROF_TRACK_ASYNC ?? DEFAULT_PROFILER_CONFIG.trackAsync,
    quiet: vars.CALLPROF_QUIET ?? DEFAULT_PROFILER_CONFIG.quiet
  };
}

export function mergeConfig(
  base: ProfilerConfig,
  overrides: Partial<ProfilerConfig>
): ProfilerConfig {
  return validateConfig({
    hookFrequency: overrides.hookFrequency ?? base.hookFrequency,
    sortMethod: overrides.sortMethod ?? base.sortMethod,
    reportPath: overrides.reportPath ?? base.reportPath,
    clock: overrides.clock ?? base.clock,
    trackAsync: overrides.trackAsync ?? base.trackAsync,
    quiet: overrides.quiet ?? base.quiet
  });
}

export function validateConfig(config: ProfilerConfig): ProfilerConfig {
  const errors: string[] = [];

  const frequency = HookFrequencySchema.safeParse(config.hookFrequency);
  if (!frequency.success) {
    errors.push(`hookFrequency must be a non-negative integer (got ${config.hookFrequency})`);
  }
  if (!SortMethodSchema.safeParse(config.sortMethod).success) {
    errors.push(`sortMethod must be "duration" or "count" (got ${config.sortMethod})`);
  }
  if (!ClockKindSchema.safeParse(config.clock).success) {
    errors.push(`clock must be "cpu" or "wall" (got ${config.clock})`);
  }
  if (config.reportPath.length === 0) {
    errors.push('reportPath must not be empty');
  }

  if (errors.length > 0) {
    throw new ProfilerConfigError(errors);
  }
  return config;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
}
