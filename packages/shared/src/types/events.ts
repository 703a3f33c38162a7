import type { FileAccessReason } from '../errors';
import type { ChangeKind, DigestAlgorithm, ModificationReason } from './snapshot';

/**
 * Base interface for all filewarden events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the invocation */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a scan pass begins */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    command: 'init' | 'check';
    fileCount: number;
    algorithm: DigestAlgorithm;
    concurrency: number;
  };
}

/** Emitted when every resolved path has a record or a failure */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    recordCount: number;
    failureCount: number;
    durationMs: number;
  };
}

/** Emitted for each path that could not be fingerprinted */
export interface FileUnreadable extends BaseEvent {
  type: 'FileUnreadable';
  payload: {
    path: string;
    reason: FileAccessReason;
    message: string;
  };
}

/** Emitted by `check` for every path that is not unchanged */
export interface ChangeDetected extends BaseEvent {
  type: 'ChangeDetected';
  payload: {
    path: string;
    kind: Exclude<ChangeKind, 'unchanged'>;
    reasons: ModificationReason[];
  };
}

/** Emitted after a snapshot has been swapped into the baseline store */
export interface BaselineSaved extends BaseEvent {
  type: 'BaselineSaved';
  payload: {
    dbPath: string;
    fileCount: number;
    algorithm: DigestAlgorithm;
  };
}

export type MonitorEvent = ScanStarted | ScanFinished | FileUnreadable | ChangeDetected | BaselineSaved;
