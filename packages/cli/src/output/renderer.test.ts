import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigError, type ChangeRecord, type FileRecord } from '@filewarden/shared';
import type { CheckResult } from '@filewarden/core';
import { ReportRenderer } from './renderer';

const strip = (s: string) => s.replace(/\u001b\[[0-9;]*m/g, '');

function record(path: string): FileRecord {
  return { path, size: 3, mtimeMs: 1, mode: 0o644, digest: 'ab', algorithm: 'sha256' };
}

function checkResult(changes: ChangeRecord[], clean: boolean): CheckResult {
  const summary = { added: 0, removed: 0, modified: 0, unchanged: 0, unreadable: 0 };
  changes.forEach((c) => summary[c.kind]++);
  return {
    runId: 'run-1',
    dbPath: '/var/lib/fw.db',
    algorithm: 'sha256',
    report: { changes, summary, clean },
    warnings: [],
    updated: false,
  };
}

describe('ReportRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const lines = () => logSpy.mock.calls.map((c) => strip(String(c[0])));

  it('groups changes by kind with their reasons', () => {
    new ReportRenderer(false).renderCheck(
      checkResult(
        [
          {
            path: '/etc/a',
            kind: 'modified',
            previous: record('/etc/a'),
            current: record('/etc/a'),
            reasons: ['content', 'size'],
            metadataDrift: [],
          },
          {
            path: '/etc/b',
            kind: 'unreadable',
            reasons: [],
            metadataDrift: [],
            failure: { path: '/etc/b', reason: 'permission-denied', message: 'denied' },
          },
          {
            path: '/etc/c',
            kind: 'unchanged',
            previous: record('/etc/c'),
            current: record('/etc/c'),
            reasons: [],
            metadataDrift: ['mtime'],
          },
        ],
        false,
      ),
    );

    expect(lines()).toEqual([
      'Modified (1):',
      '  ~ /etc/a [content, size]',
      'Unreadable (1):',
      '  ! /etc/b (permission-denied: denied)',
      '❌ Changes detected: 1 modified, 0 added, 0 removed, 1 unreadable, 1 unchanged',
    ]);
  });

  it('shows metadata drift on unchanged files when they are listed', () => {
    new ReportRenderer(false).renderCheck(
      checkResult(
        [
          {
            path: '/etc/c',
            kind: 'unchanged',
            previous: record('/etc/c'),
            current: record('/etc/c'),
            reasons: [],
            metadataDrift: ['mtime'],
          },
        ],
        true,
      ),
      { showUnchanged: true },
    );

    expect(lines()).toEqual([
      'Unchanged (1):',
      '  = /etc/c (metadata: mtime)',
      '✅ No changes: 0 modified, 0 added, 0 removed, 0 unreadable, 1 unchanged',
    ]);
  });

  it('renders init results with failures and warnings', () => {
    new ReportRenderer(false).renderInit({
      runId: 'run-1',
      dbPath: '/var/lib/fw.db',
      algorithm: 'md5',
      fileCount: 4,
      failures: [{ path: '/root/secret', reason: 'permission-denied', message: 'denied' }],
      warnings: ["Include path '/nope' does not exist. Skipping."],
      replaced: true,
    });

    expect(lines()).toEqual([
      '✅ Baseline replaced: 4 files (md5)',
      '  Database: /var/lib/fw.db',
      '\nNot recorded (1):',
      '  ! /root/secret (permission-denied)',
      '\nWarnings (1):',
      "  Include path '/nope' does not exist. Skipping.",
    ]);
  });

  it('renders JSON output when json mode is enabled', () => {
    new ReportRenderer(true).renderStatus({ exists: false, dbPath: '/var/lib/fw.db' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      exists: false,
      dbPath: '/var/lib/fw.db',
    });
  });

  it('prints application errors with their details', () => {
    new ReportRenderer(false).error(new ConfigError('Bad config', { details: 'line 3' }));

    expect(errSpy.mock.calls.map((c) => strip(String(c[0])))).toEqual([
      '❌ Error: Bad config',
      '  Details: line 3',
    ]);
  });

  it('prints errors as JSON in json mode', () => {
    new ReportRenderer(true).error(new Error('boom'));

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      error: { code: 'UnknownError', message: 'boom' },
    });
    expect(errSpy).not.toHaveBeenCalled();
  });
});
