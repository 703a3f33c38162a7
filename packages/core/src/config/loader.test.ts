import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, join, resolve, type ConfigFile } from '@filewarden/shared';
import {
  ConfigLoader,
  DEFAULT_DATABASE_PATH,
  defaultConcurrency,
  resolveDatabasePath,
} from './loader';

describe('ConfigLoader', () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(() => {
    tmpDir = resolve(fs.mkdtempSync(join(os.tmpdir(), 'filewarden-config-test-')));
    configPath = join(tmpDir, 'filewarden.yaml');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(config: ConfigFile | string): void {
    fs.writeFileSync(configPath, typeof config === 'string' ? config : yaml.dump(config));
  }

  describe('load', () => {
    it('applies defaults for an empty file', () => {
      writeConfig('');
      const config = ConfigLoader.load({ configPath, env: {} });

      expect(config).toEqual({
        configPath,
        include: [],
        exclude: [],
        ignorePatterns: [],
        hashAlgorithm: 'sha256',
        metadataPolicy: 'content-only',
        symlinks: 'follow',
        concurrency: defaultConcurrency(),
        maxFileSizeBytes: 1024 * 1024 * 1024,
        fileTimeoutMs: 30_000,
        logLevel: 'info',
        verboseConsoleOutput: true,
      });
    });

    it('resolves paths against the config file directory', () => {
      writeConfig({
        include: ['data', '/etc/hosts'],
        exclude: ['data/cache'],
        log_file: 'logs/filewarden.jsonl',
      });
      const config = ConfigLoader.load({ configPath, cwd: '/somewhere/else', env: {} });

      expect(config.include).toEqual([`${tmpDir}/data`, '/etc/hosts']);
      expect(config.exclude).toEqual([`${tmpDir}/data/cache`]);
      expect(config.logFile).toBe(`${tmpDir}/logs/filewarden.jsonl`);
    });

    it('accepts algorithm and log level names in any case', () => {
      writeConfig({ hash_algorithm: 'SHA512', log_level: 'warning' });
      const config = ConfigLoader.load({ configPath, env: {} });

      expect(config.hashAlgorithm).toBe('sha512');
      expect(config.logLevel).toBe('warn');
    });

    it('maps CRITICAL to the error level', () => {
      writeConfig({ log_level: 'CRITICAL' });
      expect(ConfigLoader.load({ configPath, env: {} }).logLevel).toBe('error');
    });

    it('reads every tuning key', () => {
      writeConfig({
        ignore_patterns: ['*.swp'],
        metadata_policy: 'strict',
        symlinks: 'skip',
        concurrency: 3,
        max_file_size_bytes: 2048,
        file_timeout_ms: 500,
        verbose_console_output: false,
      });
      const config = ConfigLoader.load({ configPath, env: {} });

      expect(config.ignorePatterns).toEqual(['*.swp']);
      expect(config.metadataPolicy).toBe('strict');
      expect(config.symlinks).toBe('skip');
      expect(config.concurrency).toBe(3);
      expect(config.maxFileSizeBytes).toBe(2048);
      expect(config.fileTimeoutMs).toBe(500);
      expect(config.verboseConsoleOutput).toBe(false);
    });

    it('returns a frozen config', () => {
      writeConfig({});
      expect(Object.isFrozen(ConfigLoader.load({ configPath, env: {} }))).toBe(true);
    });

    it('should fail if the config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: join(tmpDir, 'missing.yaml'), env: {} })).toThrow(
        `Config file not found: ${tmpDir}/missing.yaml`,
      );
    });

    it('wraps YAML syntax errors in a ConfigError', () => {
      writeConfig('include: [unclosed');
      expect(() => ConfigLoader.load({ configPath, env: {} })).toThrow(ConfigError);
      expect(() => ConfigLoader.load({ configPath, env: {} })).toThrow(/Error parsing YAML file/);
    });

    it('rejects an unsupported hash algorithm', () => {
      writeConfig({ hash_algorithm: 'crc32' });
      expect(() => ConfigLoader.load({ configPath, env: {} })).toThrow(
        /Configuration validation failed:\n- hash_algorithm: Invalid enum value/,
      );
    });

    it('rejects unknown keys', () => {
      writeConfig('include: []\nbogus: true\n');
      expect(() => ConfigLoader.load({ configPath, env: {} })).toThrow(
        /- \(root\): Unrecognized key\(s\) in object: 'bogus'/,
      );
    });

    it('rejects a non-positive concurrency', () => {
      writeConfig({ concurrency: 0 });
      expect(() => ConfigLoader.load({ configPath, env: {} })).toThrow(/- concurrency:/);
    });
  });

  describe('environment overrides', () => {
    it('finds the config through FILEWARDEN_CONFIG', () => {
      writeConfig({ include: ['a'] });
      const config = ConfigLoader.load({ cwd: '/', env: { FILEWARDEN_CONFIG: configPath } });
      expect(config.configPath).toBe(configPath);
    });

    it('prefers an explicit path over FILEWARDEN_CONFIG', () => {
      writeConfig({});
      expect(
        ConfigLoader.resolveConfigPath({
          configPath,
          env: { FILEWARDEN_CONFIG: '/ignored.yaml' },
        }),
      ).toBe(configPath);
    });

    it('defaults to filewarden.yaml in the working directory', () => {
      expect(ConfigLoader.resolveConfigPath({ cwd: '/srv', env: {} })).toBe('/srv/filewarden.yaml');
    });

    it('overrides the log file with FILEWARDEN_LOG_FILE, relative to cwd', () => {
      writeConfig({ log_file: 'from-config.jsonl' });
      const config = ConfigLoader.load({
        configPath,
        cwd: '/var/run',
        env: { FILEWARDEN_LOG_FILE: 'fw.jsonl' },
      });
      expect(config.logFile).toBe('/var/run/fw.jsonl');
    });
  });
});

describe('resolveDatabasePath', () => {
  it('defaults under the working directory', () => {
    expect(resolveDatabasePath({ cwd: '/srv', env: {} })).toBe(`/srv/${DEFAULT_DATABASE_PATH}`);
  });

  it('uses FILEWARDEN_DATABASE when no flag is given', () => {
    expect(resolveDatabasePath({ cwd: '/srv', env: { FILEWARDEN_DATABASE: 'db/fw.db' } })).toBe(
      '/srv/db/fw.db',
    );
  });

  it('prefers the flag', () => {
    expect(
      resolveDatabasePath({
        databasePath: '/abs/fw.db',
        cwd: '/srv',
        env: { FILEWARDEN_DATABASE: 'db/fw.db' },
      }),
    ).toBe('/abs/fw.db');
  });
});
