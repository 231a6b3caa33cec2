import { z } from 'zod';

/** A tag name as written in source: letters, digits and underscores, leading letter. */
const TagNameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_]*$/, 'tag names must be identifiers such as TODO or NOTE');

export const ScanConfigSchema = z.object({
  /** Built-in tags to match. */
  tags: z.array(TagNameSchema).min(1).default(['TODO', 'FIXME', 'HACK', 'BUG', 'XXX']),
  /** Extra tags, reported as custom. */
  customTags: z.array(TagNameSchema).default([]),
  caseSensitive: z.boolean().default(true),
  mode: z.enum(['baseline', 'ast']).default('baseline'),
  workers: z.number().int().min(1).max(64).default(4),
  largeFileThresholdBytes: z
    .number()
    .int()
    .positive()
    .default(256 * 1024),
});

export const DiscoveryConfigSchema = z.object({
  maxFileSizeBytes: z.number().int().positive().default(10_000_000),
  exclude: z.array(z.string()).default([]),
  respectGitignore: z.boolean().default(true),
});

export const CacheConfigSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().min(1).default('.tagscan/cache.db'),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  file: z.string().optional(),
});

export const TagscanConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  scan: ScanConfigSchema.default({}),
  discovery: DiscoveryConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type TagscanConfig = z.infer<typeof TagscanConfigSchema>;
/** Shape accepted from a config file or flag overrides, before defaults apply. */
export type TagscanConfigInput = z.input<typeof TagscanConfigSchema>;
