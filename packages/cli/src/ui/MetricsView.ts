import Table from 'cli-table3';
import chalk from 'chalk';
import type { CommandResult, HealthResponse, InfoResponse, MetricsSnapshot } from '@sentinel/shared';
import {
  formatGb,
  formatPercentDisplay,
  formatRate,
  formatTimestamp,
  formatUsage,
} from '../utils/format.js';

export function renderMetrics(snapshot: MetricsSnapshot): string {
  const table = new Table({
    head: [chalk.bold('metric'), chalk.bold('value')],
    style: {
      head: [],
      border: ['gray'],
    },
    colWidths: [16, 40],
  });

  const { memory, disk, network, uptime } = snapshot;

  table.push(
    ['CPU', formatPercentDisplay(snapshot.cpu)],
    ['Memory', formatUsage(memory.used_gb, memory.total_gb, memory.percentage)],
    ['Disk', formatUsage(disk.used_gb, disk.total_gb, disk.percentage)],
    ['Network out', formatRate(network.outbound_kbits_per_sec)],
    ['Total sent', formatGb(network.total_sent_gb)],
    ['Total received', formatGb(network.total_received_gb)],
    ['Uptime', uptime.uptime_formatted],
    ['Boot time', formatTimestamp(uptime.boot_time)],
  );

  const lines = [
    chalk.bold(`\n  System metrics`) + chalk.gray(`  ${formatTimestamp(snapshot.timestamp)}`),
    table.toString(),
    '',
  ];
  return lines.join('\n');
}

export function renderHealth(health: HealthResponse): string {
  const lines: string[] = [];
  lines.push(`\n  Status:    ${chalk.green(health.status)}`);
  lines.push(`  Service:   ${health.service}`);
  lines.push(`  Timestamp: ${formatTimestamp(health.timestamp)}`);
  lines.push('');
  return lines.join('\n');
}

export function renderInfo(info: InfoResponse): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`\n  ${info.service} v${info.version}`));
  lines.push(`  Authentication: ${info.authentication}`);
  lines.push('  Endpoints:');
  for (const endpoint of info.endpoints) {
    lines.push(`    ${endpoint}`);
  }
  lines.push('');
  return lines.join('\n');
}

/** Describe the outcome of an update or reboot. */
export function renderCommandResult(action: string, result: CommandResult): string {
  const lines: string[] = [];

  switch (result.outcome) {
    case 'succeeded':
      lines.push(chalk.green(`  ${action} completed successfully`));
      break;
    case 'initiated':
      lines.push(chalk.green(`  ${action} initiated`));
      break;
    case 'timed-out':
      lines.push(chalk.yellow(`  ${action} timed out; the host state is uncertain`));
      break;
    case 'rejected':
      lines.push(chalk.yellow(`  ${action} rejected`));
      break;
    case 'failed':
      lines.push(chalk.red(`  ${action} failed`));
      break;
  }

  if (result.error) {
    lines.push(chalk.red(`  Error: ${result.error}`));
  }
  if (result.upgrade_output) {
    lines.push('', chalk.bold('  Upgrade output:'), result.upgrade_output.trimEnd());
  }
  if (!result.success && result.errors) {
    lines.push('', chalk.bold('  Errors:'), result.errors.trimEnd());
  }

  return lines.join('\n');
}
