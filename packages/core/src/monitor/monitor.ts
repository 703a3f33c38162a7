import { randomUUID } from 'crypto';
import {
  AlgorithmMismatchError,
  BaselineExistsError,
  BaselineNotFoundError,
  ScanAbortedError,
  logger as defaultLogger,
  type BaseEvent,
  type Baseline,
  type ChangeReport,
  type Config,
  type DigestAlgorithm,
  type Logger,
  type ScanFailure,
  type Snapshot,
} from '@filewarden/shared';
import { Fingerprinter, PathResolver, Scanner, diffSnapshots } from '@filewarden/engine';
import { withBaselineLock, type BaselineInfo, type BaselineStore } from '@filewarden/store';

export interface MonitorOptions {
  config: Config;
  store: BaselineStore;
  logger?: Logger;
  runId?: string;
  resolver?: PathResolver;
}

export interface InitOptions {
  /** Replace an existing baseline */
  force?: boolean;
  signal?: AbortSignal;
}

export interface InitResult {
  runId: string;
  dbPath: string;
  algorithm: DigestAlgorithm;
  fileCount: number;
  failures: ScanFailure[];
  warnings: string[];
  /** An earlier baseline was overwritten */
  replaced: boolean;
}

export interface CheckOptions {
  /** Accept the new snapshot as the baseline after reporting */
  update?: boolean;
  signal?: AbortSignal;
}

export interface CheckResult {
  runId: string;
  dbPath: string;
  algorithm: DigestAlgorithm;
  report: ChangeReport;
  warnings: string[];
  updated: boolean;
}

export type StatusResult = { exists: false; dbPath: string } | ({ exists: true } & BaselineInfo);

export async function baselineStatus(store: BaselineStore): Promise<StatusResult> {
  const info = await store.info();
  return info ? { exists: true, ...info } : { exists: false, dbPath: store.dbPath };
}

/**
 * The snapshot to accept on re-baseline. A tracked file that could not be read keeps
 * its accepted record, so making a file unreadable for one run cannot erase it.
 */
export function carryForward(baseline: Baseline, snapshot: Snapshot): Snapshot {
  const records = new Map(snapshot.records);
  for (const failure of snapshot.failures) {
    const previous = baseline.records.get(failure.path);
    if (previous && failure.reason !== 'not-found') {
      records.set(failure.path, previous);
    }
  }
  return { ...snapshot, records };
}

/**
 * Drives one invocation: resolves the monitored paths, scans them and
 * compares or persists the result. Mutating commands hold the baseline lock.
 */
export class Monitor {
  readonly runId: string;
  private readonly config: Config;
  private readonly store: BaselineStore;
  private readonly logger: Logger;
  private readonly resolver: PathResolver;
  private readonly scanner: Scanner;

  constructor(options: MonitorOptions) {
    this.config = options.config;
    this.store = options.store;
    this.logger = options.logger ?? defaultLogger;
    this.runId = options.runId ?? randomUUID();
    this.resolver = options.resolver ?? new PathResolver();
    this.scanner = new Scanner({
      fingerprinter: new Fingerprinter({
        algorithm: this.config.hashAlgorithm,
        maxFileSizeBytes: this.config.maxFileSizeBytes,
        timeoutMs: this.config.fileTimeoutMs,
        logger: this.logger,
      }),
      concurrency: this.config.concurrency,
      logger: this.logger,
    });
  }

  async init(options: InitOptions = {}): Promise<InitResult> {
    const dbPath = this.store.dbPath;

    return withBaselineLock(dbPath, async () => {
      const replaced = await this.store.exists();
      if (replaced && !options.force) {
        throw new BaselineExistsError(dbPath);
      }

      const snapshot = await this.takeSnapshot('init', options.signal);
      await this.persist(snapshot, options.signal);

      return {
        runId: this.runId,
        dbPath,
        algorithm: snapshot.algorithm,
        fileCount: snapshot.records.size,
        failures: snapshot.failures,
        warnings: snapshot.warnings,
        replaced,
      };
    });
  }

  async check(options: CheckOptions = {}): Promise<CheckResult> {
    const dbPath = this.store.dbPath;

    return withBaselineLock(dbPath, async () => {
      const baseline = await this.store.load();
      if (!baseline) {
        throw new BaselineNotFoundError(dbPath);
      }
      // Refuse before spending a full scan on digests that cannot be compared.
      if (baseline.algorithm !== this.config.hashAlgorithm) {
        throw new AlgorithmMismatchError(baseline.algorithm, this.config.hashAlgorithm);
      }

      const snapshot = await this.takeSnapshot('check', options.signal);
      const report = diffSnapshots(baseline, snapshot, {
        metadataPolicy: this.config.metadataPolicy,
      });

      for (const change of report.changes) {
        if (change.kind === 'unchanged') continue;
        await this.logger.log({
          ...this.eventMeta(),
          type: 'ChangeDetected',
          payload: { path: change.path, kind: change.kind, reasons: change.reasons },
        });
      }

      const s = report.summary;
      await this.logger.info(
        `Check finished: ${s.modified} modified, ${s.added} added, ${s.removed} removed, ${s.unreadable} unreadable, ${s.unchanged} unchanged`,
      );

      if (options.update) {
        await this.persist(carryForward(baseline, snapshot), options.signal);
      }

      return {
        runId: this.runId,
        dbPath,
        algorithm: snapshot.algorithm,
        report,
        warnings: snapshot.warnings,
        updated: options.update === true,
      };
    });
  }

  status(): Promise<StatusResult> {
    return baselineStatus(this.store);
  }

  private async takeSnapshot(command: 'init' | 'check', signal?: AbortSignal): Promise<Snapshot> {
    const resolved = await this.resolver.resolve({
      include: this.config.include,
      exclude: this.config.exclude,
      ignorePatterns: this.config.ignorePatterns,
      symlinks: this.config.symlinks,
    });
    for (const warning of resolved.warnings) {
      await this.logger.warn(warning.message);
    }

    await this.logger.log({
      ...this.eventMeta(),
      type: 'ScanStarted',
      payload: {
        command,
        fileCount: resolved.files.length,
        algorithm: this.scanner.algorithm,
        concurrency: this.config.concurrency,
      },
    });

    const startedAt = Date.now();
    const snapshot = await this.scanner.scan(resolved.files, {
      signal,
      warnings: resolved.warnings.map((w) => w.message),
    });

    for (const failure of snapshot.failures) {
      await this.logger.log({ ...this.eventMeta(), type: 'FileUnreadable', payload: failure });
    }
    await this.logger.log({
      ...this.eventMeta(),
      type: 'ScanFinished',
      payload: {
        recordCount: snapshot.records.size,
        failureCount: snapshot.failures.length,
        durationMs: Date.now() - startedAt,
      },
    });

    return snapshot;
  }

  private async persist(snapshot: Snapshot, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ScanAbortedError();
    }

    await this.store.save(snapshot);
    await this.logger.log({
      ...this.eventMeta(),
      type: 'BaselineSaved',
      payload: {
        dbPath: this.store.dbPath,
        fileCount: snapshot.records.size,
        algorithm: snapshot.algorithm,
      },
    });
    await this.logger.info(
      `Baseline saved to ${this.store.dbPath}: ${snapshot.records.size} files (${snapshot.algorithm})`,
    );
  }

  private eventMeta(): Omit<BaseEvent, 'type'> {
    return { schemaVersion: 1, timestamp: new Date().toISOString(), runId: this.runId };
  }
}
