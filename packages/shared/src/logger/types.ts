import type { ScanEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Interface for logging throughout tagscan.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'ScanStarted', ... });
 * logger.info('Scan completed');
 * logger.error(new Error('Failed'), 'Cache open failed');
 *
 * const fileLogger = logger.child({ file: 'src/main.rs' });
 * ```
 */
export interface Logger {
  /**
   * Persist a structured scan event.
   */
  log(event: ScanEvent): MaybePromise<void>;

  /** Log a debug message (lowest priority, typically disabled) */
  debug(message: string): MaybePromise<void>;
  /** Log an informational message */
  info(message: string): MaybePromise<void>;
  /** Log a warning message */
  warn(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   */
  child(bindings: Record<string, unknown>): Logger;
}
