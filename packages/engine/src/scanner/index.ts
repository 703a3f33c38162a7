import {
  FileAccessError,
  ScanAbortedError,
  logger as defaultLogger,
  type DigestAlgorithm,
  type FileRecord,
  type Logger,
  type ScanFailure,
  type Snapshot,
} from '@filewarden/shared';
import { Fingerprinter } from '../fingerprint/fingerprinter';
import { runPool } from './pool';

export { runPool } from './pool';

export interface ScannerOptions {
  fingerprinter: Fingerprinter;
  /** Maximum files fingerprinted at once */
  concurrency?: number;
  logger?: Logger;
}

export interface ScanRunOptions {
  signal?: AbortSignal;
  /** Carried into the snapshot, e.g. path resolution warnings */
  warnings?: string[];
}

type ScanOutcome = { record: FileRecord } | { failure: ScanFailure };

/**
 * Fingerprints a resolved path set into a Snapshot. Per-file failures are recorded
 * on the snapshot; only an abort rejects.
 */
export class Scanner {
  private readonly fingerprinter: Fingerprinter;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(options: ScannerOptions) {
    this.fingerprinter = options.fingerprinter;
    this.concurrency = options.concurrency ?? 4;
    this.logger = options.logger ?? defaultLogger;
  }

  get algorithm(): DigestAlgorithm {
    return this.fingerprinter.algorithm;
  }

  async scan(paths: readonly string[], options: ScanRunOptions = {}): Promise<Snapshot> {
    const { signal } = options;

    const outcomes = await runPool(
      paths,
      this.concurrency,
      async (path): Promise<ScanOutcome> => {
        try {
          const record = await this.fingerprinter.fingerprint(path, signal);
          await this.logger.debug(`Fingerprinted ${path}: ${record.digest}`);
          return { record };
        } catch (error) {
          if (error instanceof FileAccessError) {
            await this.logger.warn(`Skipping ${path}: ${error.message}`);
            return { failure: { path: error.path, reason: error.reason, message: error.message } };
          }
          throw error;
        }
      },
      signal,
    );

    if (signal?.aborted) {
      throw new ScanAbortedError();
    }

    // Single merge point: workers only ever write their own slot.
    const records = new Map<string, FileRecord>();
    const failures: ScanFailure[] = [];
    for (const outcome of outcomes) {
      if ('record' in outcome) {
        records.set(outcome.record.path, outcome.record);
      } else {
        failures.push(outcome.failure);
      }
    }

    return {
      algorithm: this.fingerprinter.algorithm,
      takenAt: new Date(),
      records,
      failures,
      warnings: [...(options.warnings ?? [])],
    };
  }
}
