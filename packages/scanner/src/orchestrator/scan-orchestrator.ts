import { randomUUID } from 'node:crypto';
import {
  AppError,
  EVENT_SCHEMA_VERSION,
  silentLogger,
  type ErrorCode,
  type Logger,
  type ScanEvent,
} from '@tagscan/shared';
import type { FingerprintCache } from '../cache/fingerprint-cache';
import { IncrementalScanner, type FileScanResult } from '../incremental';
import { getDefaultRegistry, type LanguageRegistry } from '../languages/registry';
import type { LargeFileReader } from '../reader/large-file-reader';
import type { ExtractionStrategy } from '../strategy';
import type { Finding, ScanError, ScanErrorCode, ScanStatistics, ScanWarning } from '../types';
import { runPool } from './pool';
import { emptyStatistics, mergeStatistics, statisticsForFile } from './stats';

export const DEFAULT_WORKERS = 4;

export interface ScanRequest {
  strategy: ExtractionStrategy;
  workers?: number;
  cache?: FingerprintCache;
  reader?: LargeFileReader;
  /** Base directory for relative paths in the file list */
  root?: string;
  signal?: AbortSignal;
  /** Called once per scanned file, in completion order. A throw is logged and ignored. */
  onFile?: (result: FileScanResult) => void;
}

export interface ScanOutcome {
  /** Per-file line/column order; files follow the input order */
  findings: Finding[];
  stats: ScanStatistics;
  errors: ScanError[];
  warnings: ScanWarning[];
  cancelled: boolean;
}

export interface ScanOrchestratorOptions {
  registry?: LanguageRegistry;
  logger?: Logger;
  runId?: string;
}

const ERROR_CODES: Partial<Record<ErrorCode, ScanErrorCode>> = {
  IoError: 'IO_ERROR',
  EncodingError: 'ENCODING_ERROR',
  CacheError: 'CACHE_ERROR',
};

export function toScanError(file: string, error: unknown): ScanError {
  const code = error instanceof AppError ? (ERROR_CODES[error.code] ?? 'UNKNOWN_ERROR') : 'UNKNOWN_ERROR';
  const message = error instanceof Error ? error.message : String(error);
  return { file, code, message };
}

type FileSlot =
  | { kind: 'scanned'; result: FileScanResult }
  | { kind: 'skipped' }
  | { kind: 'failed'; error: ScanError };

/**
 * Entry point for multi-file scans. Files are independent units of work pulled by a bounded
 * pool; a failing file yields one error entry and the rest of the batch carries on. Only
 * the caller's `signal` ends a scan early, at file granularity.
 */
export class ScanOrchestrator {
  private readonly registry: LanguageRegistry;
  private readonly logger: Logger;
  private readonly runId: string;

  constructor(options: ScanOrchestratorOptions = {}) {
    this.registry = options.registry ?? getDefaultRegistry();
    this.logger = options.logger ?? silentLogger;
    this.runId = options.runId ?? randomUUID();
  }

  async scan(files: readonly string[], request: ScanRequest): Promise<ScanOutcome> {
    const startedAt = Date.now();
    const workers = request.workers ?? DEFAULT_WORKERS;
    const scanner = new IncrementalScanner({
      strategy: request.strategy,
      cache: request.cache,
      reader: request.reader,
      root: request.root,
    });

    await this.emit({
      type: 'ScanStarted',
      payload: { fileCount: files.length, strategy: request.strategy.name, workers },
    });
    if (request.cache?.resetReason) {
      await this.emit({
        type: 'CacheReset',
        payload: { reason: request.cache.resetReason, path: request.cache.dbPath },
      });
    }

    const slots = Array.from<FileSlot | undefined>({ length: files.length });

    const pool = await runPool(
      files,
      workers,
      async (file, index) => {
        const syntax = this.registry.forPath(file);
        if (!syntax) {
          slots[index] = { kind: 'skipped' };
          this.logger.debug(`Skipping ${file}: no comment syntax for its extension`);
          return;
        }
        let result: FileScanResult;
        try {
          result = await scanner.scanFile(file, syntax);
        } catch (error) {
          const scanError = toScanError(file, error);
          slots[index] = { kind: 'failed', error: scanError };
          await this.emit({ type: 'FileFailed', payload: { ...scanError } });
          return;
        }
        slots[index] = { kind: 'scanned', result };

        try {
          request.onFile?.(result);
        } catch (error) {
          // Observer failures do not fail the file.
          await this.logger.error(
            error instanceof Error ? error : new Error(String(error)),
            `onFile callback failed for ${file}`,
          );
        }
      },
      request.signal,
    );

    const outcome = this.merge(slots);
    outcome.cancelled = pool.cancelled;
    outcome.stats.elapsedMs = Date.now() - startedAt;

    for (const warning of outcome.warnings) {
      if (warning.code === 'PARSE_FALLBACK') {
        await this.emit({
          type: 'VerifierFallback',
          payload: { file: warning.file, reason: warning.message },
        });
      }
    }
    await this.emit({
      type: 'ScanFinished',
      payload: {
        filesScanned: outcome.stats.filesScanned,
        totalFindings: outcome.stats.totalFindings,
        filesFailed: outcome.stats.filesFailed,
        filesFromCache: outcome.stats.filesFromCache,
        cancelled: outcome.cancelled,
        elapsedMs: outcome.stats.elapsedMs,
      },
    });

    return outcome;
  }

  private merge(slots: readonly (FileSlot | undefined)[]): ScanOutcome {
    const outcome: ScanOutcome = {
      findings: [],
      stats: emptyStatistics(),
      errors: [],
      warnings: [],
      cancelled: false,
    };

    for (const slot of slots) {
      if (!slot) continue; // never started (cancelled)
      switch (slot.kind) {
        case 'scanned':
          outcome.findings.push(...slot.result.findings);
          outcome.warnings.push(...slot.result.warnings);
          outcome.stats = mergeStatistics(outcome.stats, statisticsForFile(slot.result));
          break;
        case 'skipped':
          outcome.stats = mergeStatistics(outcome.stats, { ...emptyStatistics(), filesSkipped: 1 });
          break;
        case 'failed':
          outcome.errors.push(slot.error);
          outcome.stats = mergeStatistics(outcome.stats, { ...emptyStatistics(), filesFailed: 1 });
          break;
      }
    }

    return outcome;
  }

  private async emit(event: DistributiveOmit<ScanEvent, 'schemaVersion' | 'timestamp' | 'runId'>): Promise<void> {
    await this.logger.log({
      ...event,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: this.runId,
    });
  }
}

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
