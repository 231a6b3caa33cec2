/**
 * Base interface for all scan events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the scan run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a scan starts.
 */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    /** Number of candidate files handed to the scan */
    fileCount: number;
    /** Extraction strategy name */
    strategy: string;
    /** Worker pool size */
    workers: number;
  };
}

/** Emitted when a single file could not be scanned */
export interface FileFailed extends BaseEvent {
  type: 'FileFailed';
  payload: {
    file: string;
    code: string;
    message: string;
  };
}

/** Emitted when the cache store was wiped on open */
export interface CacheReset extends BaseEvent {
  type: 'CacheReset';
  payload: {
    reason: 'schema-mismatch' | 'corrupted';
    path: string;
  };
}

/** Emitted when the AST layer fell back to baseline candidates */
export interface VerifierFallback extends BaseEvent {
  type: 'VerifierFallback';
  payload: {
    file: string;
    reason: string;
  };
}

/**
 * Emitted when a scan completes, cancelled or not.
 */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    filesScanned: number;
    totalFindings: number;
    filesFailed: number;
    filesFromCache: number;
    cancelled: boolean;
    elapsedMs: number;
  };
}

export type ScanEvent = ScanStarted | FileFailed | CacheReset | VerifierFallback | ScanFinished;

export const EVENT_SCHEMA_VERSION = 1;
