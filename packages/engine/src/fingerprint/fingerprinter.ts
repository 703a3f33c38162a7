import nodeFs, { type FileHandle } from 'node:fs/promises';
import { constants } from 'node:fs';
import {
  DEFAULT_FILE_TIMEOUT_MS,
  DEFAULT_MAX_FILE_SIZE_BYTES,
  FileAccessError,
  ScanAbortedError,
  errorCode,
  logger as defaultLogger,
  resolve,
  type DigestAlgorithm,
  type FileAccessReason,
  type FileRecord,
  type Logger,
} from '@filewarden/shared';
import { createDigestFactory, type DigestFactory } from './digest';

type Fs = typeof nodeFs;

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface FingerprinterOptions {
  algorithm: DigestAlgorithm;
  /** Files larger than this, or that grow past it while being read, fail with `too-large` */
  maxFileSizeBytes?: number;
  /** Reading one file for longer than this fails with `timeout` */
  timeoutMs?: number;
  chunkSize?: number;
  fs?: Fs;
  now?: () => number;
  logger?: Logger;
}

export function toFileAccessError(path: string, error: unknown): FileAccessError | ScanAbortedError {
  if (error instanceof FileAccessError || error instanceof ScanAbortedError) {
    return error;
  }
  const code = errorCode(error);
  let reason: FileAccessReason = 'io-error';
  if (code === 'EACCES' || code === 'EPERM') {
    reason = 'permission-denied';
  } else if (code === 'ENOENT') {
    reason = 'not-found';
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new FileAccessError(path, reason, `Cannot read ${path}: ${detail}`, { cause: error });
}

/**
 * Produces a FileRecord for one file: a streamed content digest plus the metadata
 * from a single fstat on the same open handle.
 */
export class Fingerprinter {
  readonly algorithm: DigestAlgorithm;
  private readonly newDigest: DigestFactory;
  private readonly maxFileSizeBytes: number;
  private readonly timeoutMs: number;
  private readonly chunkSize: number;
  private readonly fs: Fs;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: FingerprinterOptions) {
    this.algorithm = options.algorithm;
    this.newDigest = createDigestFactory(options.algorithm);
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FILE_TIMEOUT_MS;
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.fs = options.fs ?? nodeFs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? defaultLogger;
  }

  async fingerprint(filePath: string, signal?: AbortSignal): Promise<FileRecord> {
    const path = resolve(filePath);
    if (signal?.aborted) {
      throw new ScanAbortedError();
    }

    let handle: FileHandle;
    try {
      // O_NONBLOCK keeps a FIFO swapped in after enumeration from blocking the open.
      handle = await this.fs.open(path, constants.O_RDONLY | (constants.O_NONBLOCK ?? 0));
    } catch (error) {
      throw toFileAccessError(path, error);
    }

    let record: FileRecord;
    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new FileAccessError(path, 'not-regular', `${path} is not a regular file`);
      }
      if (stats.size > this.maxFileSizeBytes) {
        throw this.tooLarge(path, stats.size);
      }

      const digest = await this.digestContent(handle, path, signal);

      record = Object.freeze({
        path,
        size: stats.size,
        mtimeMs: stats.mtimeMs,
        mode: stats.mode & 0o777,
        digest,
        algorithm: this.algorithm,
      });
    } catch (error) {
      if (error instanceof FileAccessError && error.reason === 'timeout') {
        // close() waits for the stalled read to finish; do not hold up the scan on it.
        void handle.close().catch((closeError: unknown) => {
          void this.logger.warn(`Failed to close ${path} after timeout: ${String(closeError)}`);
        });
        throw error;
      }
      await handle.close();
      throw toFileAccessError(path, error);
    }

    await handle.close();
    return record;
  }

  private async digestContent(
    handle: FileHandle,
    path: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const digest = this.newDigest();
    const buffer = Buffer.allocUnsafe(this.chunkSize);
    const deadline = this.now() + this.timeoutMs;
    let total = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new ScanAbortedError();
      }

      const bytesRead = await this.readChunk(handle, buffer, path, deadline);
      if (bytesRead === 0) break;

      total += bytesRead;
      if (total > this.maxFileSizeBytes) {
        throw this.tooLarge(path, total);
      }
      digest.update(buffer.subarray(0, bytesRead));
    }

    return digest.finalize();
  }

  /**
   * One read, raced against the time left before `deadline`.
   */
  private async readChunk(
    handle: FileHandle,
    buffer: Buffer,
    path: string,
    deadline: number,
  ): Promise<number> {
    const remaining = deadline - this.now();
    if (remaining < 0) {
      throw this.timedOut(path);
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(this.timedOut(path)), remaining);
    });
    try {
      const { bytesRead } = await Promise.race([
        handle.read(buffer, 0, buffer.length, null),
        expired,
      ]);
      return bytesRead;
    } finally {
      clearTimeout(timer);
    }
  }

  private timedOut(path: string): FileAccessError {
    return new FileAccessError(
      path,
      'timeout',
      `Reading ${path} took longer than ${this.timeoutMs}ms`,
    );
  }

  private tooLarge(path: string, size: number): FileAccessError {
    return new FileAccessError(
      path,
      'too-large',
      `${path} is ${size} bytes, over the ${this.maxFileSizeBytes} byte limit`,
    );
  }
}
