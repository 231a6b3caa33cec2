export const name = '@tagscan/cli';

export { createProgram } from './program';
export { ConfigLoader, CONFIG_FILE, type ConfigOptions, type LoadedConfig } from './config/loader';
export { createLogger } from './logging';
export * from './commands';
export * from './output';
export type { GlobalOptions } from './types';
