import * as fs from 'fs/promises';
import type { ScanEvent } from '../types/events';
import { LOG_LEVEL_ORDER, type LogLevel, type Logger } from './types';
import { formatBindings } from './prefix';

/**
 * Appends scan events to a JSONL file; plain messages at or above `level` go to the console.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly level: LogLevel;

  constructor(filePath: string, bindings: Record<string, unknown> = {}, level: LogLevel = 'debug') {
    this.filePath = filePath;
    this.bindings = bindings;
    this.level = level;
  }

  async log(event: ScanEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail the scan.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    if (!this.enabled('debug')) return;
    console.debug(formatBindings(this.bindings, message));
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    console.info(formatBindings(this.bindings, message));
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    console.warn(formatBindings(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(formatBindings(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[this.level];
  }
}
