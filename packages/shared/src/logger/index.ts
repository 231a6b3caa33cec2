import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger };

/**
 * A logger that drops everything. Default for library callers that pass none.
 */
export const silentLogger = new ConsoleLogger({ level: 'silent' });
