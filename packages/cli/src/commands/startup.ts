import { Command } from 'commander';
import chalk from 'chalk';
import { platform } from 'node:os';
import { DEFAULT_SENTINEL_HOME, SENTINEL_SERVICE_ID } from '@sentinel/shared';
import { UNIT_PATH, generateSystemdUnit } from '../utils/systemd.js';

interface StartupOptions {
  agent: string;
  user: string;
  home: string;
}

export const startupCommand = new Command('startup')
  .argument('[platform]', 'Target platform (systemd)')
  .description('Generate a service unit that starts the agent on boot')
  .option('--agent <command>', 'Command that starts the agent', '/usr/bin/env sentinel-agent')
  .option('--user <user>', 'User the agent runs as', 'root')
  .option('--home <dir>', 'Agent configuration directory', DEFAULT_SENTINEL_HOME)
  .action((targetPlatform: string | undefined, options: StartupOptions) => {
    const os = targetPlatform || detectPlatform();

    console.log(chalk.bold('\n  Sentinel Startup Unit\n'));

    if (os !== 'systemd') {
      console.log(chalk.yellow(`  Platform "${os}" is not supported.`));
      console.log(`  Supported: systemd (Linux)\n`);
      process.exitCode = 1;
      return;
    }

    const unit = generateSystemdUnit({
      execStart: options.agent,
      user: options.user,
      home: options.home,
    });

    console.log(`  To run the agent on boot:\n`);
    console.log(`  1. Create the service file:`);
    console.log(chalk.cyan(`     sudo nano ${UNIT_PATH}\n`));
    console.log(`  2. Paste this content:\n`);
    console.log(chalk.gray(unit));
    console.log(`  3. Enable and start it:`);
    console.log(chalk.cyan(`     sudo systemctl daemon-reload`));
    console.log(chalk.cyan(`     sudo systemctl enable --now ${SENTINEL_SERVICE_ID}\n`));
    console.log(`  4. Read the password printed on first start:`);
    console.log(chalk.cyan(`     sudo journalctl -u ${SENTINEL_SERVICE_ID} --no-pager | grep Password:\n`));
  });

function detectPlatform(): string {
  const os = platform();
  if (os === 'linux') return 'systemd';
  return os;
}
