import fs from 'node:fs/promises';
import path from 'node:path';
import { AppError, IoError } from '@tagscan/shared';
import type { FingerprintCache } from './cache/fingerprint-cache';
import type { LanguageSyntax } from './languages/registry';
import { LargeFileReader } from './reader/large-file-reader';
import type { ExtractionStrategy } from './strategy';
import type { FileFingerprint, Finding, PrecisionCounters, ScanWarning } from './types';

export interface FileScanResult {
  file: string;
  fingerprint: FileFingerprint;
  findings: Finding[];
  warnings: ScanWarning[];
  precision?: PrecisionCounters;
  fromCache: boolean;
}

export interface IncrementalScannerOptions {
  strategy: ExtractionStrategy;
  cache?: FingerprintCache;
  reader?: LargeFileReader;
  /** Relative file paths resolve against this directory. Defaults to the working directory. */
  root?: string;
}

/**
 * Runs a strategy behind the fingerprint cache: a file whose (mtime, size) matches its
 * cached entry is answered from the cache without opening it.
 */
export class IncrementalScanner {
  readonly strategy: ExtractionStrategy;
  private readonly cache?: FingerprintCache;
  private readonly reader: LargeFileReader;
  private readonly root: string;

  constructor(options: IncrementalScannerOptions) {
    this.strategy = options.strategy;
    this.cache = options.cache;
    this.reader = options.reader ?? new LargeFileReader();
    this.root = options.root ?? process.cwd();
  }

  async fingerprint(file: string): Promise<FileFingerprint> {
    const absPath = path.resolve(this.root, file);
    try {
      const stats = await fs.stat(absPath);
      if (!stats.isFile()) {
        throw new IoError(file, `Not a regular file: ${file}`);
      }
      return { mtimeMs: stats.mtimeMs, sizeBytes: stats.size };
    } catch (error) {
      if (error instanceof AppError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new IoError(file, `Cannot stat ${file}: ${reason}`, { cause: error });
    }
  }

  async scanFile(file: string, syntax: LanguageSyntax): Promise<FileScanResult> {
    const fingerprint = await this.fingerprint(file);

    if (this.cache?.isFresh(file, fingerprint)) {
      const entry = this.cache.get(file);
      if (entry) {
        return { file, fingerprint, findings: entry.findings, warnings: [], fromCache: true };
      }
    }

    const source = await this.reader.open(path.resolve(this.root, file), {
      sizeBytes: fingerprint.sizeBytes,
      label: file,
    });
    const result = await this.strategy.extract(source, syntax);

    if (this.cache) {
      try {
        // Stored under the pre-read fingerprint: an edit during the read shows up as stale next time.
        this.cache.put(file, fingerprint, result.findings);
      } catch (error) {
        throw new AppError('CacheError', `Cannot store cache entry for ${file}`, { cause: error });
      }
    }

    return {
      file,
      fingerprint,
      findings: result.findings,
      warnings: result.warnings,
      precision: result.precision,
      fromCache: false,
    };
  }
}
