export { registerScanCommand, runScan, buildScanFlags, type ScanCommandOptions } from './scan';
export { registerCacheCommand, clearCache } from './cache';
