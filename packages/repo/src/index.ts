export const name = '@unilist/repo';

export * from './git';
export * from './scanner';
