import fs from 'fs';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { ScanAbortedError } from '@filewarden/shared';
import { registerInitCommand } from './commands/init';
import { registerCheckCommand } from './commands/check';
import { registerStatusCommand } from './commands/status';
import {
  EXIT_FATAL,
  EXIT_INTERRUPTED,
  EXIT_OK,
  globalOptions,
  rendererFor,
  type CliContext,
} from './commands/context';

export const name = '@filewarden/cli';

export { EXIT_CHANGES, EXIT_FATAL, EXIT_INTERRUPTED, EXIT_OK } from './commands/context';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8');
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Aborting it interrupts the running scan */
  signal?: AbortSignal;
}

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name('filewarden')
    .description('Detect added, removed and modified files against a stored baseline')
    .version(readVersion())
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerInitCommand(program, ctx);
  registerCheckCommand(program, ctx);
  registerStatusCommand(program, ctx);

  return program;
}

/**
 * Runs one invocation and returns its exit code: 0 clean, 1 changes found,
 * 2 fatal error, 130 interrupted.
 */
export async function run(argv: string[], options: RunOptions = {}): Promise<number> {
  const ctx: CliContext = {
    cwd: options.cwd ?? process.cwd(),
    env: options.env ?? process.env,
    signal: options.signal ?? new AbortController().signal,
    exitCode: EXIT_OK,
  };
  const program = createProgram(ctx);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return ctx.exitCode;
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander has already printed help, the version or the usage error.
      return e.exitCode === 0 ? EXIT_OK : EXIT_FATAL;
    }

    const renderer = rendererFor(program);
    if (e instanceof ScanAbortedError || ctx.signal.aborted) {
      renderer.error(new ScanAbortedError('Interrupted. The baseline was not changed.'));
      return EXIT_INTERRUPTED;
    }

    renderer.error(e, globalOptions(program).verbose === true);
    return EXIT_FATAL;
  }
}
