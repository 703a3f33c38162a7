/**
 * Error codes used throughout filewarden.
 * Configuration, usage and store errors abort the current command.
 * File access errors are collected per file and never abort a scan.
 */
export type ErrorCode =
  | 'ConfigError'
  | 'UsageError'
  | 'StoreError'
  | 'FileAccessError'
  | 'AbortError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all filewarden errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('StoreError', 'Baseline write failed', {
 *   cause: originalError,
 *   details: { dbPath },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * Raised before any scan starts.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the baseline and the current run disagree on the digest algorithm.
 * Digests from different algorithms cannot be compared, so the check is refused.
 */
export class AlgorithmMismatchError extends ConfigError {
  public readonly baselineAlgorithm: string;
  public readonly currentAlgorithm: string;

  constructor(baselineAlgorithm: string, currentAlgorithm: string, options: AppErrorOptions = {}) {
    super(
      `Baseline was built with ${baselineAlgorithm} but the current configuration selects ${currentAlgorithm}. ` +
        `Re-run 'filewarden init --force' to rebuild the baseline with ${currentAlgorithm}.`,
      options,
    );
    this.baselineAlgorithm = baselineAlgorithm;
    this.currentAlgorithm = currentAlgorithm;
  }
}

/**
 * Why a single file could not be fingerprinted.
 */
export type FileAccessReason =
  | 'permission-denied'
  | 'not-found'
  | 'too-large'
  | 'timeout'
  | 'not-regular'
  | 'io-error';

/**
 * Error raised for one file during a scan. The scanner records it as a failure
 * for that path instead of propagating it.
 */
export class FileAccessError extends AppError {
  public readonly path: string;
  public readonly reason: FileAccessReason;

  constructor(
    path: string,
    reason: FileAccessReason,
    message: string,
    options: AppErrorOptions = {},
  ) {
    super('FileAccessError', message, options);
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Error thrown when the baseline store cannot be read or written.
 */
export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreError', message, options);
  }
}

/**
 * Error thrown when a command needs a baseline and none exists.
 */
export class BaselineNotFoundError extends StoreError {
  constructor(dbPath: string, options: AppErrorOptions = {}) {
    super(`Baseline database not found at ${dbPath}. Run 'filewarden init' first.`, options);
  }
}

/**
 * Error thrown when the baseline database is unreadable or has an unknown layout.
 */
export class BaselineCorruptedError extends StoreError {}

/**
 * Error thrown when another invocation holds the baseline lock.
 */
export class BaselineLockedError extends StoreError {
  /** Pid recorded in the lock file, when readable */
  public readonly ownerPid?: number;

  constructor(lockPath: string, ownerPid?: number, options: AppErrorOptions = {}) {
    super(
      ownerPid === undefined
        ? `Baseline is locked (${lockPath}).`
        : `Baseline is locked by process ${ownerPid} (${lockPath}).`,
      options,
    );
    this.ownerPid = ownerPid;
  }
}

/**
 * Error thrown by `init` when a baseline already exists and overwriting was not requested.
 */
export class BaselineExistsError extends UsageError {
  constructor(dbPath: string, options: AppErrorOptions = {}) {
    super(`Baseline database '${dbPath}' already exists. Use --force to overwrite it.`, options);
  }
}

/**
 * Error thrown when a scan is interrupted. No snapshot is produced.
 */
export class ScanAbortedError extends AppError {
  constructor(message = 'Scan aborted before completion.', options: AppErrorOptions = {}) {
    super('AbortError', message, options);
  }
}

/**
 * The `code` of a Node.js system error (`ENOENT`, `EACCES`, ...), if any.
 */
export function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}
