// ===========================================================================
// Error taxonomy
//
// Every error the composer raises on purpose extends AppError, so callers can
// branch on `code` (or instanceof) and surface a precise message to the user.
//
//   fatal, raised before any I/O:  InvalidIntervalError, OverlapError,
//                                  OutOfRangeError, EmptyInputError,
//                                  UnsortedInputError, ConfigError,
//                                  PlanFormatError
//   recoverable per request:       ClipUnavailableError
//   fatal for the current job:     CacheWriteError, BrollUnavailableError,
//                                  JobCancelledError, RenderError
// ===========================================================================

export type AppErrorCode =
  | 'INVALID_INTERVAL'
  | 'OVERLAP'
  | 'OUT_OF_RANGE'
  | 'EMPTY_INPUT'
  | 'UNSORTED_INPUT'
  | 'CLIP_UNAVAILABLE'
  | 'CACHE_WRITE'
  | 'BROLL_UNAVAILABLE'
  | 'JOB_CANCELLED'
  | 'CONFIG'
  | 'PLAN_FORMAT'
  | 'RENDER';

export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: AppErrorCode, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidIntervalError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_INTERVAL', details);
  }
}

export class OverlapError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OVERLAP', details);
  }
}

export class OutOfRangeError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OUT_OF_RANGE', details);
  }
}

export class EmptyInputError extends AppError {
  constructor(message: string) {
    super(message, 'EMPTY_INPUT');
  }
}

export class UnsortedInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UNSORTED_INPUT', details);
  }
}

/** The clip source found nothing usable for a query, or failed trying. */
export class ClipUnavailableError extends AppError {
  public readonly query: string;
  public readonly reason: string;

  constructor(query: string, reason: string, cause?: unknown) {
    super(`No clip available for "${query}": ${reason}`, 'CLIP_UNAVAILABLE', { query, reason }, { cause });
    this.query = query;
    this.reason = reason;
  }
}

export class CacheWriteError extends AppError {
  public readonly path: string;

  constructor(path: string, reason: string, cause?: unknown) {
    super(`Failed to write cache file ${path}: ${reason}`, 'CACHE_WRITE', { path, reason }, { cause });
    this.path = path;
  }
}

export interface FailedCutaway {
  requestIndex: number;
  query: string;
  reason: string;
}

/** Strict mode: at least one cutaway could not be sourced. */
export class BrollUnavailableError extends AppError {
  public readonly failures: FailedCutaway[];

  constructor(failures: FailedCutaway[]) {
    const list = failures.map((f) => `#${f.requestIndex} "${f.query}" (${f.reason})`).join('; ');
    super(`${failures.length} cutaway clip(s) unavailable in strict mode: ${list}`, 'BROLL_UNAVAILABLE', {
      failures,
    });
    this.failures = failures;
  }
}

export class JobCancelledError extends AppError {
  constructor(reason = 'Job cancelled') {
    super(reason, 'JOB_CANCELLED');
  }
}

export class ConfigError extends AppError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG', { issues });
    this.issues = issues;
  }
}

export class PlanFormatError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PLAN_FORMAT', details);
  }
}

export class RenderError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'RENDER', undefined, { cause });
  }
}

/** JobCancelledError carrying an aborted signal's reason. */
export function cancellationError(signal: AbortSignal): JobCancelledError {
  return new JobCancelledError(signal.reason instanceof Error ? signal.reason.message : 'Job cancelled');
}

/** Message of an unknown caught value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node errno code (ENOSPC, EACCES, ...) of an unknown caught value, if it carries one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Errnos that mean the local disk refused a write. */
export const WRITE_ERRNO_CODES: ReadonlySet<string> = new Set(['ENOSPC', 'EACCES', 'EROFS', 'EPERM', 'EDQUOT']);

/** First write errno found on the error or down its `cause` chain. */
export function writeErrnoCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; current instanceof Error && depth < 10; depth++) {
    const code = errnoCode(current);
    if (code && WRITE_ERRNO_CODES.has(code)) return code;
    current = current.cause;
  }
  return undefined;
}
