import { mkdirSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { objectHash } from 'ohash';
import { CacheCorruptedError } from '@tagscan/shared';
import { fingerprintsEqual, type CacheEntry, type FileFingerprint, type Finding } from '../types';
import {
  CACHE_SCHEMA_VERSION,
  CREATE_TABLES_SQL,
  CacheRowSchema,
  CountRowSchema,
  FindingListSchema,
  MetaRowSchema,
} from './schema';

export const IN_MEMORY = ':memory:';

export interface FingerprintCacheOptions {
  dbPath: string;
  /**
   * Extraction settings that change findings for identical input. Folded into the schema
   * version, so switching profile invalidates the store like a schema bump.
   */
  profile?: Record<string, unknown>;
}

export type CacheResetReason = 'schema-mismatch' | 'corrupted';

export interface FingerprintCacheStats {
  entries: number;
  schemaVersion: string;
}

/**
 * Durable path -> (fingerprint, findings) store shared by all scan workers.
 * Each `put` is one transaction keyed by path; there is no cross-key locking.
 */
export interface FingerprintCache {
  readonly dbPath: string;
  readonly schemaVersion: string;
  /** Why the store was wiped on open, if it was. */
  readonly resetReason?: CacheResetReason;
  get(path: string): CacheEntry | undefined;
  put(path: string, fingerprint: FileFingerprint, findings: Finding[]): void;
  isFresh(path: string, fingerprint: FileFingerprint): boolean;
  clear(): void;
  stats(): FingerprintCacheStats;
  close(): void;
}

export function cacheSchemaVersion(profile: Record<string, unknown> = {}): string {
  return `${CACHE_SCHEMA_VERSION}:${objectHash(profile)}`;
}

function removeDatabaseFiles(dbPath: string): void {
  for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    rmSync(file, { force: true });
  }
}

function connect(dbPath: string, schemaVersion: string): { db: Database.Database; reset: boolean } {
  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.exec(CREATE_TABLES_SQL);

    const stored = MetaRowSchema.safeParse(
      db.prepare(`SELECT value FROM cache_meta WHERE key = 'schema_version'`).get(),
    );
    const reset = stored.success && stored.data.value !== schemaVersion;

    db.transaction(() => {
      if (reset) {
        db.exec('DROP TABLE IF EXISTS file_entries');
        db.exec(CREATE_TABLES_SQL);
      }
      db.prepare(
        `INSERT INTO cache_meta (key, value) VALUES ('schema_version', ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
      ).run(schemaVersion);
    })();

    return { db, reset };
  } catch (error) {
    db.close();
    throw error;
  }
}

/**
 * Opens (creating if needed) the SQLite cache in WAL mode. A schema mismatch empties the
 * store; an unreadable database file is deleted and recreated.
 *
 * @throws CacheCorruptedError when the store cannot be recreated either
 */
export function openFingerprintCache(options: FingerprintCacheOptions): FingerprintCache {
  const { dbPath } = options;
  const schemaVersion = cacheSchemaVersion(options.profile);

  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  let db: Database.Database;
  let resetReason: CacheResetReason | undefined;
  try {
    const opened = connect(dbPath, schemaVersion);
    db = opened.db;
    resetReason = opened.reset ? 'schema-mismatch' : undefined;
  } catch (error) {
    if (!(error instanceof Database.SqliteError) || dbPath === IN_MEMORY) {
      throw new CacheCorruptedError(`Cannot open cache at ${dbPath}`, { cause: error });
    }
    removeDatabaseFiles(dbPath);
    try {
      db = connect(dbPath, schemaVersion).db;
    } catch (retryError) {
      throw new CacheCorruptedError(`Cannot recreate cache at ${dbPath}`, { cause: retryError });
    }
    resetReason = 'corrupted';
  }

  const selectEntry = db.prepare(
    'SELECT path, mtime_ms, size_bytes, schema_version, findings_json FROM file_entries WHERE path = ?',
  );
  const upsertEntry = db.prepare(`
    INSERT INTO file_entries (path, mtime_ms, size_bytes, schema_version, findings_json, updated_at)
    VALUES (@path, @mtimeMs, @sizeBytes, @schemaVersion, @findingsJson, @updatedAt)
    ON CONFLICT(path) DO UPDATE SET
      mtime_ms = excluded.mtime_ms,
      size_bytes = excluded.size_bytes,
      schema_version = excluded.schema_version,
      findings_json = excluded.findings_json,
      updated_at = excluded.updated_at
  `);
  const countEntries = db.prepare('SELECT COUNT(*) AS count FROM file_entries');

  const upsert = db.transaction(
    (path: string, fingerprint: FileFingerprint, findings: Finding[]) => {
      upsertEntry.run({
        path,
        mtimeMs: fingerprint.mtimeMs,
        sizeBytes: fingerprint.sizeBytes,
        schemaVersion,
        findingsJson: JSON.stringify(findings),
        updatedAt: Date.now(),
      });
    },
  );

  const get = (path: string): CacheEntry | undefined => {
    const row = CacheRowSchema.safeParse(selectEntry.get(path));
    if (!row.success || row.data.schema_version !== schemaVersion) {
      return undefined;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(row.data.findings_json);
    } catch {
      return undefined; // torn or hand-edited row reads as a miss
    }
    const findings = FindingListSchema.safeParse(decoded);
    if (!findings.success) {
      return undefined;
    }

    return {
      path: row.data.path,
      fingerprint: { mtimeMs: row.data.mtime_ms, sizeBytes: row.data.size_bytes },
      findings: findings.data,
      schemaVersion: row.data.schema_version,
    };
  };

  return {
    dbPath,
    schemaVersion,
    resetReason,
    get,
    put: (path, fingerprint, findings) => {
      upsert(path, fingerprint, findings);
    },
    isFresh: (path, fingerprint) => {
      const entry = get(path);
      return entry !== undefined && fingerprintsEqual(entry.fingerprint, fingerprint);
    },
    clear: () => {
      db.exec('DELETE FROM file_entries');
    },
    stats: () => {
      const row = CountRowSchema.parse(countEntries.get());
      return { entries: row.count, schemaVersion };
    },
    close: () => {
      if (db.open) {
        db.close();
      }
    },
  };
}
