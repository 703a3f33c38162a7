import type { MonitorEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Message severities, lowest first. `silent` disables every message.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Returns true when a message at `level` passes the `threshold`.
 */
export function isLevelEnabled(threshold: LogLevel, level: Exclude<LogLevel, 'silent'>): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

/**
 * Interface for logging throughout filewarden.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ScanStarted', ... });
 * logger.warn('Include path does not exist: /etc/missing');
 *
 * const scanLogger = logger.child({ command: 'check' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured event.
   * @param event - The event to log
   */
  log(event: MonitorEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param error - The error that occurred
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All messages from the child are prefixed with these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;

  /** Resolves once every pending write has completed */
  flush(): Promise<void>;
}
