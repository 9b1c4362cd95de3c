#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { SENTINEL_VERSION } from '@sentinel/shared';
import { healthCommand } from './commands/health.js';
import { infoCommand } from './commands/info.js';
import { metricsCommand } from './commands/metrics.js';
import { monitorCommand } from './commands/monitor.js';
import { updateCommand } from './commands/update.js';
import { rebootCommand } from './commands/reboot.js';
import { startupCommand } from './commands/startup.js';
import { doctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('sentinel')
  .version(SENTINEL_VERSION, '-v, --version')
  .description(chalk.bold('Sentinel') + ' client for remote host agents')
  .option('-H, --host <host>', 'Agent address (env SENTINEL_HOST)')
  .option('-p, --port <port>', 'Agent port (env SENTINEL_PORT)')
  .option('-P, --password <password>', 'Agent password (env SENTINEL_PASSWORD)')
  .addCommand(healthCommand)
  .addCommand(infoCommand)
  .addCommand(metricsCommand)
  .addCommand(monitorCommand)
  .addCommand(updateCommand)
  .addCommand(rebootCommand)
  .addCommand(startupCommand)
  .addCommand(doctorCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${msg}`));
  process.exitCode = 1;
});
