import { z } from 'zod';
import { DIGEST_ALGORITHMS, type DigestAlgorithm } from '../types/snapshot';
import type { LogLevel } from '../logger/types';

export const METADATA_POLICIES = ['content-only', 'strict'] as const;
/**
 * How a digest match with differing metadata is classified.
 *
 * - `content-only`: unchanged, with the drift reported separately
 * - `strict`: modified
 */
export type MetadataPolicy = (typeof METADATA_POLICIES)[number];

export const SYMLINK_POLICIES = ['follow', 'skip'] as const;
/**
 * What to do with a symlink to a regular file found while walking a directory.
 * Symlinked directories are never walked.
 */
export type SymlinkPolicy = (typeof SYMLINK_POLICIES)[number];

const CONFIG_LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

const LOG_LEVEL_MAP: Record<(typeof CONFIG_LOG_LEVELS)[number], LogLevel> = {
  DEBUG: 'debug',
  INFO: 'info',
  WARNING: 'warn',
  ERROR: 'error',
  CRITICAL: 'error',
};

export const DEFAULT_MAX_FILE_SIZE_BYTES = 1024 * 1024 * 1024;
export const DEFAULT_FILE_TIMEOUT_MS = 30_000;

/**
 * Schema of the YAML configuration file. Keys are snake_case on disk.
 */
export const ConfigFileSchema = z
  .object({
    include: z.array(z.string().min(1)).nullish().transform((v) => v ?? []),
    exclude: z.array(z.string().min(1)).nullish().transform((v) => v ?? []),
    ignore_patterns: z.array(z.string().min(1)).default([]),
    hash_algorithm: z
      .string()
      .transform((v) => v.toLowerCase())
      .pipe(z.enum(DIGEST_ALGORITHMS))
      .default('sha256'),
    metadata_policy: z.enum(METADATA_POLICIES).default('content-only'),
    symlinks: z.enum(SYMLINK_POLICIES).default('follow'),
    concurrency: z.number().int().positive().optional(),
    max_file_size_bytes: z.number().int().positive().default(DEFAULT_MAX_FILE_SIZE_BYTES),
    file_timeout_ms: z.number().int().positive().default(DEFAULT_FILE_TIMEOUT_MS),
    log_level: z
      .string()
      .transform((v) => v.toUpperCase())
      .pipe(z.enum(CONFIG_LOG_LEVELS))
      .default('INFO')
      .transform((v) => LOG_LEVEL_MAP[v]),
    verbose_console_output: z.boolean().default(true),
    log_file: z.string().min(1).optional(),
  })
  .strict();

export type ConfigFile = z.input<typeof ConfigFileSchema>;
export type ParsedConfigFile = z.output<typeof ConfigFileSchema>;

/**
 * Effective configuration for one invocation. Paths are absolute.
 */
export interface Config {
  include: string[];
  exclude: string[];
  ignorePatterns: string[];
  hashAlgorithm: DigestAlgorithm;
  metadataPolicy: MetadataPolicy;
  symlinks: SymlinkPolicy;
  concurrency: number;
  maxFileSizeBytes: number;
  fileTimeoutMs: number;
  logLevel: LogLevel;
  verboseConsoleOutput: boolean;
  logFile?: string;
}
