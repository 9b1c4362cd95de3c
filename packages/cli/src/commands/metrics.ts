import { Command } from 'commander';
import chalk from 'chalk';
import { createClient } from '../utils/client.js';
import type { GlobalFlags } from '../utils/connection.js';
import { renderMetrics } from '../ui/MetricsView.js';

export const metricsCommand = new Command('metrics')
  .description('Show a metrics snapshot')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }, command: Command) => {
    try {
      const client = createClient(command.optsWithGlobals<GlobalFlags>());
      const snapshot = await client.metrics();

      if (options.json) {
        console.log(JSON.stringify(snapshot, null, 2));
        return;
      }

      console.log(renderMetrics(snapshot));
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
    }
  });
