export const BUILTIN_TAGS = ['TODO', 'FIXME', 'HACK', 'BUG', 'XXX'] as const;

export type BuiltinTag = (typeof BUILTIN_TAGS)[number];

export const PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Priority = (typeof PRIORITIES)[number];

/**
 * One detected tag occurrence.
 *
 * `line` is 1-based; `column` is the 0-based UTF-16 offset of the tag within its line.
 * Metadata fields are only ever populated from the tag's own parenthesised group.
 */
export interface Finding {
  /** Canonical spelling from the vocabulary, e.g. `TODO` */
  tag: string;
  /** True when the tag is not one of the built-ins */
  custom: boolean;
  message: string;
  file: string;
  line: number;
  column: number;
  author?: string;
  /** Issue reference without a leading `#` */
  issue?: string;
  priority?: Priority;
  /** The full source line the tag sits on */
  contextLine: string;
}

export type CommentKind = 'line' | 'block';

export interface CommentSpan {
  kind: CommentKind;
  /** 1-based */
  startLine: number;
  /** 0-based, first character after the opening delimiter */
  startColumn: number;
  endLine: number;
  /** 0-based, exclusive; position of the close delimiter for blocks */
  endColumn: number;
}

export interface FileFingerprint {
  mtimeMs: number;
  sizeBytes: number;
}

export function fingerprintsEqual(a: FileFingerprint, b: FileFingerprint): boolean {
  return a.mtimeMs === b.mtimeMs && a.sizeBytes === b.sizeBytes;
}

export interface CacheEntry {
  path: string;
  fingerprint: FileFingerprint;
  findings: Finding[];
  schemaVersion: string;
}

export type ScanErrorCode = 'IO_ERROR' | 'ENCODING_ERROR' | 'CACHE_ERROR' | 'UNKNOWN_ERROR';

export interface ScanError {
  file: string;
  code: ScanErrorCode;
  message: string;
}

export type ScanWarningCode = 'PARSE_FALLBACK' | 'NO_GRAMMAR';

export interface ScanWarning {
  file: string;
  code: ScanWarningCode;
  message: string;
}

/** Kept/discarded counts from the AST verification layer. */
export interface PrecisionCounters {
  candidates: number;
  kept: number;
  discarded: number;
  /** Files that fell back to unfiltered baseline candidates */
  fallbacks: number;
}

export interface ScanStatistics {
  filesScanned: number;
  filesWithFindings: number;
  totalFindings: number;
  byTag: Record<string, number>;
  filesFromCache: number;
  filesSkipped: number;
  filesFailed: number;
  precision: PrecisionCounters;
  elapsedMs: number;
}
