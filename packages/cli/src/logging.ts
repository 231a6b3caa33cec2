import path from 'path';
import { ConsoleLogger, JsonlLogger, type Logger, type LoggingConfig } from '@tagscan/shared';

/**
 * Console logging at the configured level, or JSONL events when a log file is set.
 * `--verbose` lowers the level to debug.
 */
export function createLogger(config: LoggingConfig, verbose = false): Logger {
  const level = verbose ? 'debug' : config.level;
  if (config.file) {
    return new JsonlLogger(path.resolve(config.file), {}, level);
  }
  return new ConsoleLogger({ level });
}
