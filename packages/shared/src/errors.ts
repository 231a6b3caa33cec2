/**
 * Error codes used throughout tagscan.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'IoError'
  | 'EncodingError'
  | 'ParseError'
  | 'CacheError'
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
 * Base error class for all tagscan errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('IoError', 'Cannot read file', {
 *   cause: originalError,
 *   details: { path: 'src/main.rs' }
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
 * User-correctable - suggests fixing configuration files.
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
 * Error thrown when a file cannot be stat'ed or read.
 */
export class IoError extends AppError {
  /** Path of the file that failed */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('IoError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when file content is not valid UTF-8 text.
 */
export class EncodingError extends AppError {
  /** Path of the offending file, when known */
  public readonly path?: string;

  constructor(message: string, options: AppErrorOptions & { path?: string } = {}) {
    super('EncodingError', message, options);
    this.path = options.path;
  }
}

/**
 * Error raised when a syntax tree cannot be produced for a file.
 * Never fatal: callers fall back to baseline candidates.
 */
export class ParseError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ParseError', message, options);
  }
}

/**
 * Error thrown when the cache database is unreadable.
 */
export class CacheCorruptedError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CacheError', message, options);
  }
}

/**
 * Maps an error code to a process exit code.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof AppError) {
    return error.code === 'ConfigError' || error.code === 'UsageError' ? 2 : 1;
  }
  return 1;
}
