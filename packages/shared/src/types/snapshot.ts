import type { FileAccessReason } from '../errors';

/**
 * Digest algorithms a baseline can be built with.
 */
export const DIGEST_ALGORITHMS = ['sha256', 'sha512', 'md5', 'sha1'] as const;

export type DigestAlgorithm = (typeof DIGEST_ALGORITHMS)[number];

/**
 * Fingerprint of one file: content digest plus the metadata captured by the same stat call.
 */
export interface FileRecord {
  /** Absolute, normalized path */
  readonly path: string;
  readonly size: number;
  /** Modification time in epoch milliseconds */
  readonly mtimeMs: number;
  /** Permission bits (`st_mode & 0o777`) */
  readonly mode: number;
  /** Lowercase hex digest of the file content */
  readonly digest: string;
  readonly algorithm: DigestAlgorithm;
}

/**
 * A path the scanner could not fingerprint.
 */
export interface ScanFailure {
  path: string;
  reason: FileAccessReason;
  message: string;
}

/**
 * Observed state of the monitored file set from one scan pass.
 */
export interface Snapshot {
  algorithm: DigestAlgorithm;
  takenAt: Date;
  records: ReadonlyMap<string, FileRecord>;
  failures: ScanFailure[];
  warnings: string[];
}

/**
 * The last accepted snapshot, treated as ground truth for change detection.
 */
export interface Baseline {
  algorithm: DigestAlgorithm;
  createdAt: Date;
  records: ReadonlyMap<string, FileRecord>;
}

export type ChangeKind = 'added' | 'removed' | 'modified' | 'unchanged' | 'unreadable';

export const CHANGE_KINDS: readonly ChangeKind[] = [
  'added',
  'removed',
  'modified',
  'unchanged',
  'unreadable',
];

/**
 * Metadata fields compared between a baseline record and a fresh one.
 */
export type MetadataField = 'size' | 'mtime' | 'permissions';

/**
 * Reason a path is classified as modified.
 */
export type ModificationReason = 'content' | MetadataField;

/**
 * One path's classified outcome of a diff.
 */
export interface ChangeRecord {
  path: string;
  kind: ChangeKind;
  previous?: FileRecord;
  current?: FileRecord;
  /** Fields responsible for a `modified` classification */
  reasons: ModificationReason[];
  /** Metadata fields that differ although the content digest matches */
  metadataDrift: MetadataField[];
  /** Set for `unreadable` records */
  failure?: ScanFailure;
}

export interface ChangeReport {
  changes: ChangeRecord[];
  summary: Record<ChangeKind, number>;
  /** True when every record is `unchanged` */
  clean: boolean;
}
