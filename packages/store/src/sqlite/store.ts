import { promises as fs } from 'fs';
import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  BaselineCorruptedError,
  DIGEST_ALGORITHMS,
  StoreError,
  errorCode,
  logger as defaultLogger,
  removeIfExists,
  replaceFile,
  siblingTempPath,
  type Baseline,
  type FileRecord,
  type Logger,
} from '@filewarden/shared';
import { CREATE_TABLES_SQL, INSERT_FILE_SQL, INSERT_META_SQL } from './schema';
import {
  SCHEMA_VERSION,
  type BaselineInfo,
  type BaselineSnapshot,
  type BaselineStore,
} from '../types';

type DB = Database.Database;

const MetaRowSchema = z.object({
  schema_version: z.number().int(),
  algorithm: z.enum(DIGEST_ALGORITHMS),
  created_at: z.number(),
  file_count: z.number().int().nonnegative(),
  failed_count: z.number().int().nonnegative(),
});

const FileRowSchema = z.object({
  path: z.string().min(1),
  size: z.number().nonnegative(),
  mtime_ms: z.number(),
  mode: z.number().int(),
  digest: z.string().regex(/^[0-9a-f]+$/),
  algorithm: z.enum(DIGEST_ALGORITHMS),
});

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Baseline store backed by a single SQLite file.
 *
 * Saves never touch the live file: a complete database is written next to it and
 * renamed into place, so readers see either the old baseline or the new one.
 */
export class SqliteBaselineStore implements BaselineStore {
  private readonly logger: Logger;

  constructor(
    readonly dbPath: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? defaultLogger;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.dbPath);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw new StoreError(`Cannot access baseline database ${this.dbPath}: ${messageOf(error)}`, {
        cause: error,
      });
    }
  }

  async load(): Promise<Baseline | null> {
    if (!(await this.exists())) {
      return null;
    }

    return this.read((db) => {
      const meta = this.readMeta(db);
      const rows = db
        .prepare('SELECT path, size, mtime_ms, mode, digest, algorithm FROM baseline_files')
        .all();

      const records = new Map<string, FileRecord>();
      for (const row of rows) {
        const parsed = FileRowSchema.safeParse(row);
        if (!parsed.success) {
          throw new BaselineCorruptedError(
            `Baseline database ${this.dbPath} contains an invalid file row: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
          );
        }
        const r = parsed.data;
        records.set(
          r.path,
          Object.freeze({
            path: r.path,
            size: r.size,
            mtimeMs: r.mtime_ms,
            mode: r.mode,
            digest: r.digest,
            algorithm: r.algorithm,
          }),
        );
      }

      return { algorithm: meta.algorithm, createdAt: new Date(meta.created_at), records };
    });
  }

  async info(): Promise<BaselineInfo | null> {
    if (!(await this.exists())) {
      return null;
    }

    return this.read((db) => {
      const meta = this.readMeta(db);
      return {
        dbPath: this.dbPath,
        schemaVersion: meta.schema_version,
        algorithm: meta.algorithm,
        createdAt: new Date(meta.created_at),
        fileCount: meta.file_count,
        failedCount: meta.failed_count,
      };
    });
  }

  async save(snapshot: BaselineSnapshot): Promise<void> {
    let tempPath: string | undefined;
    try {
      tempPath = await siblingTempPath(this.dbPath);
      this.write(tempPath, snapshot);
      await replaceFile(tempPath, this.dbPath);
    } catch (error) {
      if (tempPath) {
        await removeIfExists(tempPath);
      }
      throw new StoreError(`Failed to save baseline to ${this.dbPath}: ${messageOf(error)}`, {
        cause: error,
      });
    }

    await this.logger.debug(
      `Saved ${snapshot.records.size} records (${snapshot.algorithm}) to ${this.dbPath}`,
    );
  }

  private write(path: string, snapshot: BaselineSnapshot): void {
    const db = new Database(path);
    try {
      db.exec(CREATE_TABLES_SQL);
      const insertMeta = db.prepare(INSERT_META_SQL);
      const insertFile = db.prepare(INSERT_FILE_SQL);

      db.transaction(() => {
        insertMeta.run(
          SCHEMA_VERSION,
          snapshot.algorithm,
          snapshot.takenAt.getTime(),
          snapshot.records.size,
          snapshot.failures.length,
        );
        for (const record of snapshot.records.values()) {
          insertFile.run(
            record.path,
            record.size,
            record.mtimeMs,
            record.mode,
            record.digest,
            record.algorithm,
          );
        }
      })();
    } finally {
      db.close();
    }
  }

  private read<T>(fn: (db: DB) => T): T {
    let db: DB | undefined;
    try {
      db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
      return fn(db);
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new BaselineCorruptedError(
        `Baseline database ${this.dbPath} is unreadable: ${messageOf(error)}`,
        { cause: error },
      );
    } finally {
      db?.close();
    }
  }

  private readMeta(db: DB): z.infer<typeof MetaRowSchema> {
    const rows = db
      .prepare(
        'SELECT schema_version, algorithm, created_at, file_count, failed_count FROM baseline_meta',
      )
      .all();
    if (rows.length !== 1) {
      throw new BaselineCorruptedError(
        `Baseline database ${this.dbPath} has ${rows.length} metadata rows, expected 1`,
      );
    }

    const parsed = MetaRowSchema.safeParse(rows[0]);
    if (!parsed.success) {
      throw new BaselineCorruptedError(
        `Baseline database ${this.dbPath} has invalid metadata: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
      );
    }
    if (parsed.data.schema_version !== SCHEMA_VERSION) {
      throw new BaselineCorruptedError(
        `Baseline database ${this.dbPath} has schema version ${parsed.data.schema_version}, expected ${SCHEMA_VERSION}`,
      );
    }
    return parsed.data;
  }
}
