import { Command } from 'commander';
import chalk from 'chalk';
import { createClient } from '../utils/client.js';
import type { GlobalFlags } from '../utils/connection.js';
import { renderHealth } from '../ui/MetricsView.js';

export const healthCommand = new Command('health')
  .description('Check that the agent is up')
  .action(async (_options: unknown, command: Command) => {
    try {
      const client = createClient(command.optsWithGlobals<GlobalFlags>());
      const health = await client.health();
      console.log(renderHealth(health));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Health check failed: ${msg}`));
      process.exitCode = 1;
    }
  });
