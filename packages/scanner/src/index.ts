export * from './types';
export * from './languages/registry';
export { CommentExtractor, ExtractionRun, type LineSource } from './extractor/comment-extractor';
export { TagVocabulary, type TagVocabularyOptions } from './extractor/vocabulary';
export { parseMetadata, parsePriority, type TagMetadata } from './extractor/metadata';
export { splitLines } from './extractor/line-splitter';
export * from './reader/large-file-reader';
export { AstCommentVerifier, emptyCounters, type VerificationResult } from './verifier/ast-verifier';
export { ParserPool } from './verifier/grammars';
export {
  IN_MEMORY,
  cacheSchemaVersion,
  openFingerprintCache,
  type CacheResetReason,
  type FingerprintCache,
  type FingerprintCacheOptions,
  type FingerprintCacheStats,
} from './cache/fingerprint-cache';
export { CACHE_SCHEMA_VERSION } from './cache/schema';
export * from './incremental';
export * from './strategy';
export * from './orchestrator/scan-orchestrator';
export { precisionRate } from './orchestrator/stats';
export * from './discovery/file-discovery';
