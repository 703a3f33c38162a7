import { describe, it, expect } from 'vitest';
import {
  AppError,
  errorCode,
  ConfigError,
  UsageError,
  AlgorithmMismatchError,
  FileAccessError,
  StoreError,
  BaselineNotFoundError,
  BaselineCorruptedError,
  BaselineLockedError,
  BaselineExistsError,
  ScanAbortedError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('StoreError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });
});

describe('ConfigError', () => {
  it('should create a ConfigError with correct code', () => {
    const error = new ConfigError('Invalid config');
    expect(error.code).toBe('ConfigError');
    expect(error.name).toBe('ConfigError');
  });
});

describe('UsageError', () => {
  it('should create a UsageError with correct code', () => {
    expect(new UsageError('Invalid usage').code).toBe('UsageError');
  });
});

describe('AlgorithmMismatchError', () => {
  it('is a ConfigError naming both algorithms', () => {
    const error = new AlgorithmMismatchError('sha256', 'md5');
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.baselineAlgorithm).toBe('sha256');
    expect(error.currentAlgorithm).toBe('md5');
    expect(error.message).toContain('built with sha256');
    expect(error.message).toContain("'filewarden init --force'");
  });
});

describe('FileAccessError', () => {
  it('carries the path and reason', () => {
    const error = new FileAccessError('/etc/shadow', 'permission-denied', 'EACCES');
    expect(error.code).toBe('FileAccessError');
    expect(error.path).toBe('/etc/shadow');
    expect(error.reason).toBe('permission-denied');
  });
});

describe('store errors', () => {
  it('share the StoreError code', () => {
    const errors = [
      new BaselineNotFoundError('/db'),
      new BaselineCorruptedError('bad'),
      new BaselineLockedError('/db.lock', 42),
    ];
    for (const error of errors) {
      expect(error).toBeInstanceOf(StoreError);
      expect(error.code).toBe('StoreError');
    }
  });

  it('mentions init when the baseline is missing', () => {
    expect(new BaselineNotFoundError('/var/lib/fw.db').message).toBe(
      "Baseline database not found at /var/lib/fw.db. Run 'filewarden init' first.",
    );
  });

  it('includes the owner pid when the lock is held', () => {
    expect(new BaselineLockedError('/db.lock', 42).message).toBe(
      'Baseline is locked by process 42 (/db.lock).',
    );
    expect(new BaselineLockedError('/db.lock').ownerPid).toBeUndefined();
  });
});

describe('BaselineExistsError', () => {
  it('is a UsageError', () => {
    const error = new BaselineExistsError('/db');
    expect(error).toBeInstanceOf(UsageError);
    expect(error.message).toContain('--force');
  });
});

describe('ScanAbortedError', () => {
  it('uses the AbortError code', () => {
    const error = new ScanAbortedError();
    expect(error.code).toBe('AbortError');
    expect(error.message).toBe('Scan aborted before completion.');
  });
});

describe('errorCode', () => {
  it('reads the code of a system error', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(errorCode(error)).toBe('ENOENT');
  });

  it('returns undefined for errors without a code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
  });
});
