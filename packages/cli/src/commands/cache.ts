import path from 'path';
import { Command } from 'commander';
import { TagVocabulary, createStrategy, openFingerprintCache } from '@tagscan/scanner';
import { ConfigLoader } from '../config/loader';
import { OutputRenderer, type CacheClearReport } from '../output';
import type { GlobalOptions } from '../types';

export function clearCache(rootArg: string | undefined, options: GlobalOptions): CacheClearReport {
  const root = path.resolve(rootArg ?? process.cwd());
  const { config } = ConfigLoader.load({ configPath: options.config, cwd: root });
  const strategy = createStrategy(
    config.scan.mode,
    new TagVocabulary({
      tags: config.scan.tags,
      customTags: config.scan.customTags,
      caseSensitive: config.scan.caseSensitive,
    }),
  );

  const cache = openFingerprintCache({
    dbPath: path.resolve(root, config.cache.path),
    profile: strategy.profile(),
  });
  try {
    const removed = cache.stats().entries;
    cache.clear();
    return { path: cache.dbPath, removed };
  } finally {
    cache.close();
  }
}

export function registerCacheCommand(program: Command) {
  const cacheCommand = program.command('cache').description('Manage the fingerprint cache');

  cacheCommand
    .command('clear')
    .description('Remove every cached scan result')
    .argument('[root]', 'Project directory (defaults to the working directory)')
    .action((root: string | undefined, _options: GlobalOptions, command: Command) => {
      const options: GlobalOptions = command.optsWithGlobals();
      new OutputRenderer(Boolean(options.json)).renderCacheCleared(clearCache(root, options));
    });
}
