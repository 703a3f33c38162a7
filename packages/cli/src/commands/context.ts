import { Command } from 'commander';
import { createLogger, type Logger } from '@filewarden/shared';
import { ConfigLoader, resolveDatabasePath, type LoadedConfig } from '@filewarden/core';
import { SqliteBaselineStore } from '@filewarden/store';
import { ReportRenderer } from '../output';

export const EXIT_OK = 0;
export const EXIT_CHANGES = 1;
export const EXIT_FATAL = 2;
export const EXIT_INTERRUPTED = 130;

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
};

/**
 * Per-invocation state shared by every command.
 */
export interface CliContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  signal: AbortSignal;
  /** Set by the command that ran */
  exitCode: number;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

export function rendererFor(program: Command): ReportRenderer {
  return new ReportRenderer(globalOptions(program).json === true);
}

export function loadConfig(ctx: CliContext, configPath?: string): LoadedConfig {
  return ConfigLoader.load({ configPath, cwd: ctx.cwd, env: ctx.env });
}

export function openStore(ctx: CliContext, databasePath: string | undefined, logger?: Logger) {
  return new SqliteBaselineStore(
    resolveDatabasePath({ databasePath, cwd: ctx.cwd, env: ctx.env }),
    logger,
  );
}

/**
 * Console output is off in JSON mode so stdout stays machine-readable.
 */
export function commandLogger(program: Command, config: LoadedConfig): Logger {
  const { json, verbose } = globalOptions(program);
  return createLogger({
    level: verbose ? 'debug' : config.logLevel,
    console: !json && (verbose === true || config.verboseConsoleOutput),
    logFile: config.logFile,
  });
}
