import { Command } from 'commander';
import chalk from 'chalk';
import { createClient } from '../utils/client.js';
import type { GlobalFlags } from '../utils/connection.js';
import { renderInfo } from '../ui/MetricsView.js';

export const infoCommand = new Command('info')
  .description('Show agent version and endpoints')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    try {
      const client = createClient(command.optsWithGlobals<GlobalFlags>());
      const info = await client.info();

      if (options.json) {
        console.log(JSON.stringify(info, null, 2));
        return;
      }

      console.log(renderInfo(info));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
