import path from 'path';
import { Command } from 'commander';
import {
  FileDiscovery,
  LargeFileReader,
  ScanOrchestrator,
  TagVocabulary,
  createStrategy,
  openFingerprintCache,
  type FingerprintCache,
} from '@tagscan/scanner';
import { UsageError, type TagscanConfigInput } from '@tagscan/shared';
import { ConfigLoader } from '../config/loader';
import { createLogger } from '../logging';
import { OutputRenderer, type ScanReport } from '../output';
import type { GlobalOptions } from '../types';

export interface ScanCommandOptions extends GlobalOptions {
  precise?: boolean;
  workers?: string;
  /** `--no-cache` sets this to false */
  cache?: boolean;
  tags?: string;
}

export function buildScanFlags(options: ScanCommandOptions): TagscanConfigInput {
  const scan: NonNullable<TagscanConfigInput['scan']> = {};
  if (options.precise) {
    scan.mode = 'ast';
  }
  if (options.workers !== undefined) {
    const workers = Number(options.workers);
    if (!Number.isInteger(workers) || workers < 1) {
      throw new UsageError(`--workers must be a positive integer, got "${options.workers}"`);
    }
    scan.workers = workers;
  }
  if (options.tags !== undefined) {
    const tags = options.tags
      .split(',')
      .map((t) => t.trim())
      .filter((t) => t.length > 0);
    if (tags.length === 0) {
      throw new UsageError('--tags needs at least one tag name');
    }
    scan.tags = tags;
  }

  const flags: TagscanConfigInput = { scan };
  if (options.cache === false) {
    flags.cache = { enabled: false };
  }
  if (options.logFile) {
    flags.logging = { file: options.logFile };
  }
  return flags;
}

export async function runScan(
  rootArg: string | undefined,
  options: ScanCommandOptions,
  signal?: AbortSignal,
): Promise<ScanReport> {
  const root = path.resolve(rootArg ?? process.cwd());
  const { config } = ConfigLoader.load({
    configPath: options.config,
    cwd: root,
    flags: buildScanFlags(options),
  });
  const logger = createLogger(config.logging, options.verbose);

  const discovered = await new FileDiscovery().discover(root, {
    exclude: config.discovery.exclude,
    respectGitignore: config.discovery.respectGitignore,
    maxFileSizeBytes: config.discovery.maxFileSizeBytes,
  });
  logger.debug(`Discovered ${discovered.files.length} files under ${root}`);

  const vocabulary = new TagVocabulary({
    tags: config.scan.tags,
    customTags: config.scan.customTags,
    caseSensitive: config.scan.caseSensitive,
  });
  const strategy = createStrategy(config.scan.mode, vocabulary);

  let cache: FingerprintCache | undefined;
  if (config.cache.enabled) {
    cache = openFingerprintCache({
      dbPath: path.resolve(root, config.cache.path),
      profile: strategy.profile(),
    });
  }

  try {
    const outcome = await new ScanOrchestrator({ logger }).scan(
      discovered.files.map((f) => f.path),
      {
        strategy,
        workers: config.scan.workers,
        cache,
        reader: new LargeFileReader({ thresholdBytes: config.scan.largeFileThresholdBytes }),
        root,
        signal,
      },
    );

    return {
      root,
      strategy: strategy.name,
      outcome,
      notices: discovered.warnings,
      cache: cache
        ? { path: cache.dbPath, entries: cache.stats().entries, resetReason: cache.resetReason }
        : undefined,
    };
  } finally {
    cache?.close();
  }
}

export function registerScanCommand(program: Command) {
  program
    .command('scan')
    .description('Scan a directory tree for TODO-style tags')
    .argument('[root]', 'Directory to scan (defaults to the working directory)')
    .option('--precise', 'Verify candidates against a syntax tree where a grammar exists')
    .option('--workers <n>', 'Number of files scanned concurrently')
    .option('--no-cache', 'Ignore and do not update the fingerprint cache')
    .option('--tags <list>', 'Comma-separated tags to look for, replacing the configured ones')
    .option('--log-file <path>', 'Append structured scan events to a JSONL file')
    .action(async (root: string | undefined, _options: ScanCommandOptions, command: Command) => {
      const options: ScanCommandOptions = command.optsWithGlobals();
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      try {
        const report = await runScan(root, options, controller.signal);
        new OutputRenderer(Boolean(options.json)).renderScan(report);
        if (report.outcome.cancelled) {
          process.exitCode = 130;
        }
      } finally {
        process.removeListener('SIGINT', onInterrupt);
      }
    });
}
