import fs from 'fs';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigFileSchema, dirname, resolve, type Config } from '@filewarden/shared';

export const DEFAULT_CONFIG_PATH = 'filewarden.yaml';
export const DEFAULT_DATABASE_PATH = '.filewarden/baseline.db';

export const ENV_CONFIG = 'FILEWARDEN_CONFIG';
export const ENV_DATABASE = 'FILEWARDEN_DATABASE';
export const ENV_LOG_FILE = 'FILEWARDEN_LOG_FILE';

export interface ConfigOptions {
  configPath?: string; // CLI override
  cwd?: string; // Base for relative CLI and environment paths
  env?: NodeJS.ProcessEnv; // Environment variables
}

export interface DatabaseOptions {
  databasePath?: string; // CLI override
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type LoadedConfig = Readonly<Config> & {
  readonly configPath: string;
};

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(8, os.availableParallelism()));
}

/**
 * Database location: `--database`, then `FILEWARDEN_DATABASE`, then the default under cwd.
 */
export function resolveDatabasePath(options: DatabaseOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  return resolve(cwd, options.databasePath || env[ENV_DATABASE] || DEFAULT_DATABASE_PATH);
}

export class ConfigLoader {
  static loadYaml(filePath: string): unknown {
    try {
      const content = fs.readFileSync(filePath, 'utf8');
      // An empty document is an empty config.
      return yaml.load(content) ?? {};
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw new ConfigError(`Cannot read config file: ${filePath}`, { cause: error });
    }
  }

  static resolveConfigPath(options: ConfigOptions = {}): string {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    return resolve(cwd, options.configPath || env[ENV_CONFIG] || DEFAULT_CONFIG_PATH);
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    const configPath = this.resolveConfigPath(options);

    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }

    const result = ConfigFileSchema.safeParse(this.loadYaml(configPath));

    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`, {
        details: { configPath },
      });
    }

    const file = result.data;
    const baseDir = dirname(configPath);
    const envLogFile = env[ENV_LOG_FILE];
    const logFile = envLogFile
      ? resolve(cwd, envLogFile)
      : file.log_file && resolve(baseDir, file.log_file);

    return Object.freeze({
      configPath,
      include: file.include.map((p) => resolve(baseDir, p)),
      exclude: file.exclude.map((p) => resolve(baseDir, p)),
      ignorePatterns: file.ignore_patterns,
      hashAlgorithm: file.hash_algorithm,
      metadataPolicy: file.metadata_policy,
      symlinks: file.symlinks,
      concurrency: file.concurrency ?? defaultConcurrency(),
      maxFileSizeBytes: file.max_file_size_bytes,
      fileTimeoutMs: file.file_timeout_ms,
      logLevel: file.log_level,
      verboseConsoleOutput: file.verbose_console_output,
      ...(logFile ? { logFile } : {}),
    });
  }
}
