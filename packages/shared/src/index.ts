export const name = '@unilist/shared';

export * from './types/events';
export * from './types/content';
export * from './logger';
export * from './errors';
export * from './fs/io';
export * from './fs/path';
export * from './config/schema';
export * from './config/validation';
