import { Command } from 'commander';
import { Monitor } from '@filewarden/core';
import {
  EXIT_CHANGES,
  EXIT_OK,
  commandLogger,
  loadConfig,
  openStore,
  rendererFor,
  type CliContext,
} from './context';

interface CheckCommandOptions {
  config?: string;
  database?: string;
  update?: boolean;
  showUnchanged?: boolean;
}

export function registerCheckCommand(program: Command, ctx: CliContext) {
  program
    .command('check')
    .description('Compare the configured paths against the baseline')
    .option('-c, --config <path>', 'Path to the YAML configuration file')
    .option('-d, --database <path>', 'Path to the baseline database')
    .option('--update', 'Replace the baseline with the new scan after reporting')
    .option('--show-unchanged', 'Also list files that did not change')
    .action(async (options: CheckCommandOptions) => {
      const config = loadConfig(ctx, options.config);
      const logger = commandLogger(program, config);
      try {
        const monitor = new Monitor({
          config,
          store: openStore(ctx, options.database, logger),
          logger,
        });
        const result = await monitor.check({ update: options.update, signal: ctx.signal });
        rendererFor(program).renderCheck(result, { showUnchanged: options.showUnchanged });
        ctx.exitCode = result.report.clean ? EXIT_OK : EXIT_CHANGES;
      } finally {
        await logger.flush();
      }
    });
}
