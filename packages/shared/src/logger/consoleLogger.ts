import type { ScanEvent } from '../types/events';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';
import { formatBindings } from './prefix';

export interface ConsoleLoggerOptions {
  /** Minimum level written; events follow the `info` threshold. */
  level?: LogLevel;
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  }

  log(event: ScanEvent): void {
    if (this.enabled('info')) {
      console.log(JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (this.enabled('info')) {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (this.enabled('warn')) {
      console.warn(message);
    }
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) {
      return;
    }
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= this.threshold;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  log(event: ScanEvent) {
    return this.base.log(event);
  }

  debug(message: string) {
    return this.base.debug(formatBindings(this.bindings, message));
  }

  info(message: string) {
    return this.base.info(formatBindings(this.bindings, message));
  }

  warn(message: string) {
    return this.base.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? formatBindings(this.bindings, message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }
}
