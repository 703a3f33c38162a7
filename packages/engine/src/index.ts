export const name = '@filewarden/engine';

export * from './resolver';
export * from './fingerprint/digest';
export * from './fingerprint/fingerprinter';
export * from './scanner';
export * from './diff';
