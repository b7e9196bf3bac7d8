/**
 * Custom Error Classes for callprof
 */

/**
 * Error thrown when a report file cannot be opened or written
 */
export class ReportWriteError extends Error {
  public readonly path: string;
  public readonly code: string | undefined;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write profile report to ${path}: ${reason}`, { cause });
    this.name = 'ReportWriteError';
    this.path = path;
    this.code = errorCode(cause);

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ReportWriteError);
    }
  }
}

/**
 * Error thrown when profiler configuration fails validation
 */
export class ProfilerConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid profiler configuration: ${issues.join('; ')}`);
    this.name = 'ProfilerConfigError';
    this.issues = issues;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
