import { Command } from 'commander';
import { Monitor } from '@filewarden/core';
import {
  EXIT_OK,
  commandLogger,
  loadConfig,
  openStore,
  rendererFor,
  type CliContext,
} from './context';

interface InitCommandOptions {
  config?: string;
  database?: string;
  force?: boolean;
}

export function registerInitCommand(program: Command, ctx: CliContext) {
  program
    .command('init')
    .description('Scan the configured paths and record them as the baseline')
    .option('-c, --config <path>', 'Path to the YAML configuration file')
    .option('-d, --database <path>', 'Path to the baseline database')
    .option('-f, --force', 'Overwrite an existing baseline')
    .action(async (options: InitCommandOptions) => {
      const config = loadConfig(ctx, options.config);
      const logger = commandLogger(program, config);
      try {
        const monitor = new Monitor({
          config,
          store: openStore(ctx, options.database, logger),
          logger,
        });
        const result = await monitor.init({ force: options.force, signal: ctx.signal });
        rendererFor(program).renderInit(result);
        ctx.exitCode = EXIT_OK;
      } finally {
        await logger.flush();
      }
    });
}
