import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import type { LogLevel, Logger } from './types';

export type { Logger, LogLevel, MaybePromise } from './types';
export { LOG_LEVELS, isLevelEnabled } from './types';

export interface CreateLoggerOptions {
  level: LogLevel;
  /** Print messages to the console */
  console: boolean;
  /** Append events and messages to this file as JSON lines */
  logFile?: string;
}

/**
 * Builds the logger for one invocation. With a log file, everything goes to the file
 * and console output is optional; without one, the console is the only sink.
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  if (options.logFile) {
    return new JsonlLogger(options.logFile, { level: options.level, echo: options.console });
  }
  return new ConsoleLogger(options.console ? options.level : 'silent');
}

/** Fallback for components constructed without a logger */
export const logger = new ConsoleLogger();

export { ConsoleLogger, JsonlLogger };
