import { Command } from 'commander';
import { baselineStatus } from '@filewarden/core';
import { EXIT_OK, openStore, rendererFor, type CliContext } from './context';

interface StatusCommandOptions {
  database?: string;
}

export function registerStatusCommand(program: Command, ctx: CliContext) {
  program
    .command('status')
    .description('Show the stored baseline')
    .option('-d, --database <path>', 'Path to the baseline database')
    .action(async (options: StatusCommandOptions) => {
      const status = await baselineStatus(openStore(ctx, options.database));
      rendererFor(program).renderStatus(status);
      ctx.exitCode = EXIT_OK;
    });
}
