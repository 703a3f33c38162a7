export const name = '@filewarden/store';

export * from './types';
export { SqliteBaselineStore } from './sqlite/store';
export { lockPathFor, withBaselineLock } from './lock';
