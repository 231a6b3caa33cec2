import type { PrecisionCounters, ScanStatistics } from '../types';

export function emptyPrecision(): PrecisionCounters {
  return { candidates: 0, kept: 0, discarded: 0, fallbacks: 0 };
}

export function emptyStatistics(): ScanStatistics {
  return {
    filesScanned: 0,
    filesWithFindings: 0,
    totalFindings: 0,
    byTag: {},
    filesFromCache: 0,
    filesSkipped: 0,
    filesFailed: 0,
    precision: emptyPrecision(),
    elapsedMs: 0,
  };
}

function mergeCounts(a: Record<string, number>, b: Record<string, number>): Record<string, number> {
  const merged: Record<string, number> = { ...a };
  for (const [tag, count] of Object.entries(b)) {
    merged[tag] = (merged[tag] ?? 0) + count;
  }
  return merged;
}

/**
 * Associative and commutative, so any grouping of per-file statistics gives the same total.
 * `elapsedMs` takes the maximum; callers overwrite it with wall-clock time.
 */
export function mergeStatistics(a: ScanStatistics, b: ScanStatistics): ScanStatistics {
  return {
    filesScanned: a.filesScanned + b.filesScanned,
    filesWithFindings: a.filesWithFindings + b.filesWithFindings,
    totalFindings: a.totalFindings + b.totalFindings,
    byTag: mergeCounts(a.byTag, b.byTag),
    filesFromCache: a.filesFromCache + b.filesFromCache,
    filesSkipped: a.filesSkipped + b.filesSkipped,
    filesFailed: a.filesFailed + b.filesFailed,
    precision: {
      candidates: a.precision.candidates + b.precision.candidates,
      kept: a.precision.kept + b.precision.kept,
      discarded: a.precision.discarded + b.precision.discarded,
      fallbacks: a.precision.fallbacks + b.precision.fallbacks,
    },
    elapsedMs: Math.max(a.elapsedMs, b.elapsedMs),
  };
}

export interface FileOutcome {
  findings: readonly { tag: string }[];
  fromCache: boolean;
  precision?: PrecisionCounters;
}

export function statisticsForFile(outcome: FileOutcome): ScanStatistics {
  const byTag: Record<string, number> = {};
  for (const finding of outcome.findings) {
    byTag[finding.tag] = (byTag[finding.tag] ?? 0) + 1;
  }
  return {
    ...emptyStatistics(),
    filesScanned: 1,
    filesWithFindings: outcome.findings.length > 0 ? 1 : 0,
    totalFindings: outcome.findings.length,
    byTag,
    filesFromCache: outcome.fromCache ? 1 : 0,
    precision: outcome.precision ? { ...outcome.precision } : emptyPrecision(),
  };
}

/** Kept share of verified candidates, as a percentage. 100 when nothing was checked. */
export function precisionRate(precision: PrecisionCounters): number {
  return precision.candidates === 0 ? 100 : (precision.kept / precision.candidates) * 100;
}
