import chalk from 'chalk';
import { format, isValid, parseISO } from 'date-fns';
import { formatBytes, formatCpu } from '@sentinel/shared';

const BYTES_PER_GB = 1024 ** 3;

export function formatPercentDisplay(value: number): string {
  const str = formatCpu(value);
  if (value > 80) return chalk.red(str);
  if (value > 50) return chalk.yellow(str);
  return chalk.green(str);
}

/** The agent reports sizes in GB; show them in the most readable unit. */
export function formatGb(value: number): string {
  return formatBytes(Math.round(value * BYTES_PER_GB));
}

export function formatRate(kbitsPerSec: number): string {
  if (kbitsPerSec >= 1024) return `${(kbitsPerSec / 1024).toFixed(2)} Mbit/s`;
  return `${kbitsPerSec.toFixed(2)} kbit/s`;
}

/** Render an ISO timestamp in local time; unparseable input is returned as-is. */
export function formatTimestamp(iso: string): string {
  const date = parseISO(iso);
  if (!isValid(date)) return iso;
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}

export function formatUsage(used: number, total: number, percentage: number): string {
  return `${formatGb(used)} / ${formatGb(total)} (${formatPercentDisplay(percentage)})`;
}
