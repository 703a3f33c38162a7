import type { Baseline, DigestAlgorithm, Snapshot } from '@filewarden/shared';

export const SCHEMA_VERSION = 1;

/**
 * What `save` persists from a scan: its records, plus the failure count for `info`.
 */
export type BaselineSnapshot = Pick<Snapshot, 'algorithm' | 'takenAt' | 'records' | 'failures'>;

export interface BaselineInfo {
  dbPath: string;
  schemaVersion: number;
  algorithm: DigestAlgorithm;
  createdAt: Date;
  fileCount: number;
  /** Paths that could not be read when the baseline was taken */
  failedCount: number;
}

/**
 * Persistent home of the accepted baseline.
 */
export interface BaselineStore {
  readonly dbPath: string;
  exists(): Promise<boolean>;
  /** Returns null when no baseline has been saved */
  load(): Promise<Baseline | null>;
  info(): Promise<BaselineInfo | null>;
  /** Replaces the stored baseline in one step; a failed save leaves the old one intact */
  save(snapshot: BaselineSnapshot): Promise<void>;
}
