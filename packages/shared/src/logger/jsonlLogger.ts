import * as fs from 'fs/promises';
import { dirname } from 'path';
import type { MonitorEvent } from '../types/events';
import { ConsoleLogger, formatBindings } from './consoleLogger';
import { isLevelEnabled, type LogLevel, type Logger } from './types';

export interface JsonlLoggerOptions {
  level?: LogLevel;
  /** Also print messages to the console */
  echo?: boolean;
}

/**
 * Serializes appends to one file. Shared by a logger and all of its children
 * so lines never interleave out of order.
 */
export class JsonlWriter {
  private pending: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(readonly filePath: string) {}

  append(record: unknown): Promise<void> {
    const line = JSON.stringify(record) + '\n';
    this.pending = this.pending.then(async () => {
      try {
        if (!this.dirReady) {
          await fs.mkdir(dirname(this.filePath), { recursive: true });
          this.dirReady = true;
        }
        await fs.appendFile(this.filePath, line, 'utf8');
      } catch (error) {
        // Best-effort: do not fail the run due to logging.
        console.error(`Failed to write to log file at ${this.filePath}`, error);
      }
    });
    return this.pending;
  }

  flush(): Promise<void> {
    return this.pending;
  }
}

export class JsonlLogger implements Logger {
  private readonly writer: JsonlWriter;
  private readonly level: LogLevel;
  private readonly echo?: ConsoleLogger;
  private readonly bindings: Record<string, unknown>;

  constructor(
    filePath: string | JsonlWriter,
    options: JsonlLoggerOptions = {},
    bindings: Record<string, unknown> = {},
  ) {
    this.writer = typeof filePath === 'string' ? new JsonlWriter(filePath) : filePath;
    this.level = options.level ?? 'info';
    this.bindings = bindings;
    if (options.echo) {
      this.echo = new ConsoleLogger(this.level, bindings);
    }
  }

  get filePath(): string {
    return this.writer.filePath;
  }

  async log(event: MonitorEvent): Promise<void> {
    await this.writer.append(event);
  }

  debug(message: string): Promise<void> {
    this.echo?.debug(message);
    return this.write('debug', message);
  }

  info(message: string): Promise<void> {
    this.echo?.info(message);
    return this.write('info', message);
  }

  warn(message: string): Promise<void> {
    this.echo?.warn(message);
    return this.write('warn', message);
  }

  error(error: Error, message?: string): Promise<void> {
    this.echo?.error(error, message);
    return this.write('error', message ?? error.message, error);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(
      this.writer,
      { level: this.level, echo: this.echo !== undefined },
      { ...this.bindings, ...bindings },
    );
  }

  flush(): Promise<void> {
    return this.writer.flush();
  }

  private async write(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    error?: Error,
  ): Promise<void> {
    if (!isLevelEnabled(this.level, level)) return;
    await this.writer.append({
      timestamp: new Date().toISOString(),
      level,
      message: formatBindings(this.bindings, message),
      ...(error ? { error: { name: error.name, message: error.message } } : {}),
    });
  }
}
