export const name = '@filewarden/shared';

export * from './types/events';
export * from './types/snapshot';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/path';
export * from './fs/io';
