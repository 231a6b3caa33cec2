import { z } from 'zod';
import { PRIORITIES } from '../types';

/** Bump when the stored row or finding layout changes. */
export const CACHE_SCHEMA_VERSION = 1;

export const FindingSchema = z.object({
  tag: z.string(),
  custom: z.boolean(),
  message: z.string(),
  file: z.string(),
  line: z.number().int().min(1),
  column: z.number().int().min(0),
  author: z.string().optional(),
  issue: z.string().optional(),
  priority: z.enum(PRIORITIES).optional(),
  contextLine: z.string(),
});

export const FindingListSchema = z.array(FindingSchema);

export const CacheRowSchema = z.object({
  path: z.string(),
  mtime_ms: z.number(),
  size_bytes: z.number().int().min(0),
  schema_version: z.string(),
  findings_json: z.string(),
});

export type CacheRow = z.infer<typeof CacheRowSchema>;

export const MetaRowSchema = z.object({ value: z.string() });

export const CountRowSchema = z.object({ count: z.number() });

export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS cache_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
  CREATE TABLE IF NOT EXISTS file_entries (
    path TEXT PRIMARY KEY,
    mtime_ms REAL NOT NULL,
    size_bytes INTEGER NOT NULL,
    schema_version TEXT NOT NULL,
    findings_json TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  );
`;
