import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { DEFAULT_MONITOR_INTERVAL } from '@sentinel/shared';
import { createClient } from '../utils/client.js';
import type { SentinelClient } from '../utils/client.js';
import type { GlobalFlags } from '../utils/connection.js';
import { renderMetrics } from '../ui/MetricsView.js';

function parseInterval(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new InvalidArgumentError('Interval must be a whole number of seconds, at least 1.');
  }
  return seconds;
}

/** One screen of the monitor: the snapshot, or the error that replaced it. */
export async function renderMonitorFrame(
  client: SentinelClient,
  intervalSeconds: number,
): Promise<string> {
  const footer = chalk.gray(`  Ctrl+C to exit  |  Refreshing every ${intervalSeconds}s`);
  try {
    const snapshot = await client.metrics();
    return `${renderMetrics(snapshot)}\n${footer}`;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return `${chalk.red(`  Failed to retrieve metrics: ${msg}`)}\n${footer}`;
  }
}

export const monitorCommand = new Command('monitor')
  .description('Poll metrics and redraw them until interrupted')
  .option(
    '-i, --interval <seconds>',
    'Seconds between refreshes',
    parseInterval,
    DEFAULT_MONITOR_INTERVAL,
  )
  .action(async (options: { interval: number }, command: Command) => {
    let client: SentinelClient;
    try {
      client = createClient(command.optsWithGlobals<GlobalFlags>());
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(chalk.red(`Error: ${msg}`));
      process.exitCode = 1;
      return;
    }

    const render = async () => {
      const frame = await renderMonitorFrame(client, options.interval);
      // Clear screen
      process.stdout.write('\x1b[2J\x1b[H');
      console.log(chalk.bold.cyan(`  Sentinel Monitor`) + chalk.gray(`  ${client.getBaseUrl()}`));
      console.log(frame);
    };

    await render();

    let rendering = false;
    const timer = setInterval(() => {
      if (rendering) return;
      rendering = true;
      void render()
        .catch((err: unknown) => {
          console.error(chalk.red(`  Error: ${err instanceof Error ? err.message : String(err)}`));
        })
        .finally(() => {
          rendering = false;
        });
    }, options.interval * 1000);

    process.on('SIGINT', () => {
      clearInterval(timer);
      console.log('\n  Monitoring stopped\n');
      process.exit(0);
    });
  });
