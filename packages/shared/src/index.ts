export const name = '@tagscan/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './config/schema';
