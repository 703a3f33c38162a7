export const name = '@filewarden/core';

export * from './config/loader';
export * from './monitor';
