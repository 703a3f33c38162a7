import type { MonitorEvent } from '../types/events';
import { isLevelEnabled, type LogLevel, type Logger } from './types';

export function formatBindings(bindings: Record<string, unknown>, message: string): string {
  const prefix = Object.entries(bindings)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(' ');
  return prefix ? `[${prefix}] ${message}` : message;
}

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  log(event: MonitorEvent): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (isLevelEnabled(this.level, 'debug')) {
      console.debug(formatBindings(this.bindings, message));
    }
  }

  info(message: string): void {
    if (isLevelEnabled(this.level, 'info')) {
      console.info(formatBindings(this.bindings, message));
    }
  }

  warn(message: string): void {
    if (isLevelEnabled(this.level, 'warn')) {
      console.warn(formatBindings(this.bindings, message));
    }
  }

  error(error: Error, message?: string): void {
    if (!isLevelEnabled(this.level, 'error')) return;
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, { ...this.bindings, ...bindings });
  }

  async flush(): Promise<void> {}
}
