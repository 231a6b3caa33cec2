import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { Finding } from '../types';
import { IN_MEMORY, cacheSchemaVersion, openFingerprintCache, type FingerprintCache } from './fingerprint-cache';

const finding: Finding = {
  tag: 'TODO',
  custom: false,
  message: 'fix race',
  file: 'src/a.rs',
  line: 10,
  column: 3,
  author: 'bob',
  issue: '7',
  priority: 'critical',
  contextLine: '// TODO(bob,#7,p:critical): fix race',
};

describe('FingerprintCache', () => {
  let tmpDir: string;
  let dbPath: string;
  const open: FingerprintCache[] = [];

  function openCache(profile?: Record<string, unknown>): FingerprintCache {
    const cache = openFingerprintCache({ dbPath, profile });
    open.push(cache);
    return cache;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tagscan-cache-'));
    dbPath = path.join(tmpDir, 'nested', 'cache.db');
  });

  afterEach(() => {
    for (const cache of open.splice(0)) cache.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('stores and returns findings with their fingerprint', () => {
    const cache = openCache();
    cache.put('src/a.rs', { mtimeMs: 1700000000123.5, sizeBytes: 42 }, [finding]);

    expect(cache.get('src/a.rs')).toEqual({
      path: 'src/a.rs',
      fingerprint: { mtimeMs: 1700000000123.5, sizeBytes: 42 },
      findings: [finding],
      schemaVersion: cache.schemaVersion,
    });
    expect(cache.get('src/missing.rs')).toBeUndefined();
  });

  it('is fresh only for an identical fingerprint', () => {
    const cache = openCache();
    cache.put('a', { mtimeMs: 100, sizeBytes: 5 }, []);

    expect(cache.isFresh('a', { mtimeMs: 100, sizeBytes: 5 })).toBe(true);
    expect(cache.isFresh('a', { mtimeMs: 101, sizeBytes: 5 })).toBe(false);
    expect(cache.isFresh('a', { mtimeMs: 100, sizeBytes: 6 })).toBe(false);
    expect(cache.isFresh('b', { mtimeMs: 100, sizeBytes: 5 })).toBe(false);
  });

  it('overwrites the previous entry for a path', () => {
    const cache = openCache();
    cache.put('a', { mtimeMs: 1, sizeBytes: 1 }, [finding]);
    cache.put('a', { mtimeMs: 2, sizeBytes: 3 }, []);

    expect(cache.get('a')?.findings).toEqual([]);
    expect(cache.get('a')?.fingerprint).toEqual({ mtimeMs: 2, sizeBytes: 3 });
    expect(cache.stats().entries).toBe(1);
  });

  it('clears every entry', () => {
    const cache = openCache();
    cache.put('a', { mtimeMs: 1, sizeBytes: 1 }, []);
    cache.put('b', { mtimeMs: 1, sizeBytes: 1 }, []);
    cache.clear();

    expect(cache.stats().entries).toBe(0);
    expect(cache.isFresh('a', { mtimeMs: 1, sizeBytes: 1 })).toBe(false);
  });

  it('persists across reopen with the same profile', () => {
    const first = openCache({ strategy: 'baseline' });
    first.put('a', { mtimeMs: 1, sizeBytes: 1 }, [finding]);
    first.close();

    const second = openCache({ strategy: 'baseline' });
    expect(second.resetReason).toBeUndefined();
    expect(second.isFresh('a', { mtimeMs: 1, sizeBytes: 1 })).toBe(true);
    expect(second.get('a')?.findings).toEqual([finding]);
  });

  it('invalidates the whole store on a schema mismatch', () => {
    const first = openCache({ strategy: 'baseline' });
    first.put('a', { mtimeMs: 1, sizeBytes: 1 }, [finding]);
    first.put('b', { mtimeMs: 1, sizeBytes: 1 }, []);
    first.close();

    const second = openCache({ strategy: 'ast' });
    expect(second.resetReason).toBe('schema-mismatch');
    expect(second.stats().entries).toBe(0);
    expect(second.get('a')).toBeUndefined();
  });

  it('recreates a corrupted database file', () => {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    fs.writeFileSync(dbPath, 'x'.repeat(4096));

    const cache = openCache();
    expect(cache.resetReason).toBe('corrupted');
    cache.put('a', { mtimeMs: 1, sizeBytes: 1 }, [finding]);
    expect(cache.get('a')?.findings).toEqual([finding]);
  });

  it('treats unreadable rows as misses', () => {
    const cache = openCache();
    cache.put('torn', { mtimeMs: 1, sizeBytes: 1 }, [finding]);
    cache.put('invalid', { mtimeMs: 1, sizeBytes: 1 }, [finding]);

    const raw = new Database(dbPath);
    raw.prepare(`UPDATE file_entries SET findings_json = '[{' WHERE path = 'torn'`).run();
    raw.prepare(`UPDATE file_entries SET findings_json = '[{"tag":1}]' WHERE path = 'invalid'`).run();
    raw.close();

    expect(cache.get('torn')).toBeUndefined();
    expect(cache.isFresh('invalid', { mtimeMs: 1, sizeBytes: 1 })).toBe(false);
  });

  it('works in memory', () => {
    const cache = openFingerprintCache({ dbPath: IN_MEMORY });
    open.push(cache);
    cache.put('a', { mtimeMs: 1, sizeBytes: 1 }, []);
    expect(cache.stats()).toEqual({ entries: 1, schemaVersion: cacheSchemaVersion() });
  });

  it('derives distinct schema versions per profile', () => {
    expect(cacheSchemaVersion({ strategy: 'ast' })).not.toBe(cacheSchemaVersion({ strategy: 'baseline' }));
    expect(cacheSchemaVersion({ a: 1, b: 2 })).toBe(cacheSchemaVersion({ b: 2, a: 1 }));
    expect(cacheSchemaVersion()).toMatch(/^1:/);
  });
});
