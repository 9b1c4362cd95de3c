import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createClient } from '../utils/client.js';
import type { GlobalFlags } from '../utils/connection.js';
import { renderCommandResult } from '../ui/MetricsView.js';

export const updateCommand = new Command('update')
  .description('Refresh the package index and upgrade packages on the host')
  .action(async (_options: unknown, command: Command) => {
    const spinner = ora('Running system update (this can take up to 30 minutes)...');
    try {
      const client = createClient(command.optsWithGlobals<GlobalFlags>());
      spinner.start();
      const result = await client.update();

      if (result.success) {
        spinner.succeed('System update completed');
      } else {
        spinner.fail('System update did not complete');
        process.exitCode = 1;
      }
      console.log(renderCommandResult('System update', result));
    } catch (err) {
      spinner.fail('System update failed');
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
