import {
  AlgorithmMismatchError,
  comparePaths,
  type Baseline,
  type ChangeKind,
  type ChangeRecord,
  type ChangeReport,
  type FileRecord,
  type MetadataField,
  type MetadataPolicy,
  type ScanFailure,
  type Snapshot,
} from '@filewarden/shared';

export interface DiffOptions {
  /** Defaults to `content-only` */
  metadataPolicy?: MetadataPolicy;
}

export type DiffBaseline = Pick<Baseline, 'algorithm' | 'records'>;
export type DiffSnapshot = Pick<Snapshot, 'algorithm' | 'records' | 'failures'>;

/**
 * Metadata fields that differ between two records of the same path.
 */
export function metadataDrift(previous: FileRecord, current: FileRecord): MetadataField[] {
  const drift: MetadataField[] = [];
  if (previous.size !== current.size) drift.push('size');
  if (previous.mtimeMs !== current.mtimeMs) drift.push('mtime');
  if (previous.mode !== current.mode) drift.push('permissions');
  return drift;
}

function classify(
  path: string,
  previous: FileRecord | undefined,
  current: FileRecord | undefined,
  failure: ScanFailure | undefined,
  policy: MetadataPolicy,
): ChangeRecord {
  // A tracked file deleted between enumeration and read is gone, not unverifiable.
  if (failure?.reason === 'not-found' && previous) {
    return { path, kind: 'removed', previous, reasons: [], metadataDrift: [] };
  }
  if (failure) {
    return { path, kind: 'unreadable', previous, failure, reasons: [], metadataDrift: [] };
  }
  if (previous && !current) {
    return { path, kind: 'removed', previous, reasons: [], metadataDrift: [] };
  }
  if (!previous && current) {
    return { path, kind: 'added', current, reasons: [], metadataDrift: [] };
  }
  if (!previous || !current) {
    throw new Error(`No record on either side for ${path}`);
  }

  if (previous.algorithm !== current.algorithm) {
    throw new AlgorithmMismatchError(previous.algorithm, current.algorithm, {
      details: { path },
    });
  }

  const drift = metadataDrift(previous, current);

  // Content is authoritative.
  if (previous.digest !== current.digest) {
    return {
      path,
      kind: 'modified',
      previous,
      current,
      reasons: ['content', ...drift],
      metadataDrift: [],
    };
  }

  if (drift.length > 0 && policy === 'strict') {
    return { path, kind: 'modified', previous, current, reasons: drift, metadataDrift: [] };
  }

  return { path, kind: 'unchanged', previous, current, reasons: [], metadataDrift: drift };
}

/**
 * Compares a fresh snapshot against the baseline. Every path in either, plus every
 * path that failed to scan, gets exactly one record; records are sorted by path.
 * A path that vanished before it could be read counts as removed, or is skipped when
 * the baseline never tracked it.
 *
 * @throws AlgorithmMismatchError when the two sides were hashed differently
 */
export function diffSnapshots(
  baseline: DiffBaseline,
  snapshot: DiffSnapshot,
  options: DiffOptions = {},
): ChangeReport {
  if (baseline.algorithm !== snapshot.algorithm) {
    throw new AlgorithmMismatchError(baseline.algorithm, snapshot.algorithm);
  }

  const policy = options.metadataPolicy ?? 'content-only';
  const failures = new Map(snapshot.failures.map((f) => [f.path, f]));
  const paths = new Set<string>([...baseline.records.keys(), ...snapshot.records.keys()]);
  for (const failure of snapshot.failures) {
    // Untracked and already gone: nothing to report.
    if (failure.reason !== 'not-found' || baseline.records.has(failure.path)) {
      paths.add(failure.path);
    }
  }

  const changes = [...paths]
    .sort(comparePaths)
    .map((path) =>
      classify(
        path,
        baseline.records.get(path),
        snapshot.records.get(path),
        failures.get(path),
        policy,
      ),
    );

  return summarize(changes);
}

export function summarize(changes: ChangeRecord[]): ChangeReport {
  const summary: Record<ChangeKind, number> = {
    added: 0,
    removed: 0,
    modified: 0,
    unchanged: 0,
    unreadable: 0,
  };
  for (const change of changes) {
    summary[change.kind]++;
  }
  return {
    changes,
    summary,
    clean: changes.every((c) => c.kind === 'unchanged'),
  };
}
