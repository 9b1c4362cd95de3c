import { Command } from 'commander';
import chalk from 'chalk';
import { createClient } from '../utils/client.js';
import type { GlobalFlags } from '../utils/connection.js';
import { renderCommandResult } from '../ui/MetricsView.js';

export const rebootCommand = new Command('reboot')
  .description('Reboot the host')
  .option('-y, --yes', 'Confirm the reboot')
  .action(async (options: { yes?: boolean }, command: Command) => {
    if (!options.yes) {
      console.error(chalk.yellow('  Rebooting takes the host offline. Re-run with --yes to confirm.'));
      process.exitCode = 1;
      return;
    }

    try {
      const client = createClient(command.optsWithGlobals<GlobalFlags>());
      console.log('  Initiating system reboot...');
      const result = await client.reboot();
      console.log(renderCommandResult('Reboot', result));
      if (!result.success) process.exitCode = 1;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
