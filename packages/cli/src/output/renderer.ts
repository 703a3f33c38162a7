import pc from 'picocolors';
import { AppError, type ChangeKind, type ChangeRecord } from '@filewarden/shared';
import type { CheckResult, InitResult, StatusResult } from '@filewarden/core';
import { printTable } from './table';

export interface CheckRenderOptions {
  showUnchanged?: boolean;
}

const SECTIONS: { kind: ChangeKind; title: string; marker: string; color: (s: string) => string }[] =
  [
    { kind: 'modified', title: 'Modified', marker: '~', color: pc.yellow },
    { kind: 'removed', title: 'Removed', marker: '-', color: pc.red },
    { kind: 'added', title: 'Added', marker: '+', color: pc.green },
    { kind: 'unreadable', title: 'Unreadable', marker: '!', color: pc.magenta },
    { kind: 'unchanged', title: 'Unchanged', marker: '=', color: pc.gray },
  ];

function describeChange(change: ChangeRecord): string {
  if (change.kind === 'modified') {
    return ` [${change.reasons.join(', ')}]`;
  }
  if (change.kind === 'unreadable' && change.failure) {
    return ` (${change.failure.reason}: ${change.failure.message})`;
  }
  if (change.kind === 'unchanged' && change.metadataDrift.length > 0) {
    return ` (metadata: ${change.metadataDrift.join(', ')})`;
  }
  return '';
}

export class ReportRenderer {
  constructor(private isJson: boolean) {}

  renderInit(result: InitResult): void {
    if (this.isJson) {
      console.log(JSON.stringify({ command: 'init', ...result }, null, 2));
      return;
    }

    const verb = result.replaced ? 'replaced' : 'created';
    console.log(
      pc.green(`✅ Baseline ${verb}: ${result.fileCount} files (${result.algorithm})`),
    );
    console.log(`  Database: ${result.dbPath}`);

    if (result.failures.length > 0) {
      console.log(pc.bold(`\nNot recorded (${result.failures.length}):`));
      result.failures.forEach((f) => console.log(pc.magenta(`  ! ${f.path} (${f.reason})`)));
    }
    this.renderWarnings(result.warnings);
  }

  renderCheck(result: CheckResult, options: CheckRenderOptions = {}): void {
    const { report } = result;
    const visible = report.changes.filter((c) => options.showUnchanged || c.kind !== 'unchanged');

    if (this.isJson) {
      console.log(
        JSON.stringify(
          {
            command: 'check',
            runId: result.runId,
            dbPath: result.dbPath,
            algorithm: result.algorithm,
            clean: report.clean,
            updated: result.updated,
            summary: report.summary,
            changes: visible,
            warnings: result.warnings,
          },
          null,
          2,
        ),
      );
      return;
    }

    for (const section of SECTIONS) {
      const changes = visible.filter((c) => c.kind === section.kind);
      if (changes.length === 0) continue;
      console.log(pc.bold(`${section.title} (${changes.length}):`));
      for (const change of changes) {
        console.log(section.color(`  ${section.marker} ${change.path}${describeChange(change)}`));
      }
    }

    const s = report.summary;
    const summary = `${s.modified} modified, ${s.added} added, ${s.removed} removed, ${s.unreadable} unreadable, ${s.unchanged} unchanged`;
    console.log(report.clean ? pc.green(`✅ No changes: ${summary}`) : pc.red(`❌ Changes detected: ${summary}`));

    if (result.updated) {
      console.log(`  Baseline updated: ${result.dbPath}`);
    }
    this.renderWarnings(result.warnings);
  }

  renderStatus(status: StatusResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(status, null, 2));
      return;
    }

    if (!status.exists) {
      console.log(`No baseline at ${status.dbPath}. Run 'filewarden init' to create one.`);
      return;
    }

    printTable([
      {
        Database: status.dbPath,
        Files: status.fileCount,
        Unreadable: status.failedCount,
        Algorithm: status.algorithm,
        Created: status.createdAt.toISOString(),
      },
    ]);
  }

  error(e: unknown, verbose = false): void {
    if (this.isJson) {
      console.log(
        JSON.stringify({
          error:
            e instanceof AppError
              ? { code: e.code, message: e.message, details: e.details }
              : { code: 'UnknownError', message: e instanceof Error ? e.message : String(e) },
        }),
      );
      return;
    }

    console.error(pc.red(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`));
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    }
  }

  private renderWarnings(warnings: string[]): void {
    if (warnings.length === 0) return;
    console.log(pc.yellow(`\nWarnings (${warnings.length}):`));
    warnings.forEach((w) => console.log(pc.yellow(`  ${w}`)));
  }
}
