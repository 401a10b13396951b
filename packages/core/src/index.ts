export const name = '@unilist/core';

export * from './whitelist/store';
export * from './scanner/codepoints';
export * from './scanner/scanner';
export * from './config/loader';
