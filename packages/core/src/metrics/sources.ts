import { readFile, statfs } from 'node:fs/promises';
import { cpus, freemem, totalmem, uptime } from 'node:os';
import { MetricUnavailableError } from '@sentinel/shared';
import type { NetworkCounters } from '@sentinel/shared';

export interface MemoryReading {
  total: number;
  available: number;
}

export interface DiskReading {
  total: number;
  used: number;
  /** Space available to unprivileged users; excludes root-reserved blocks. */
  free: number;
}

export interface BlockCounts {
  blocks: number;
  bfree: number;
  bavail: number;
  bsize: number;
}

export interface CpuTimes {
  idle: number;
  total: number;
}

const PROC_NET_DEV = '/proc/net/dev';
const PROC_MEMINFO = '/proc/meminfo';

/**
 * Parse `/proc/net/dev`, summing every interface except loopback.
 * Column 1 is received bytes, column 9 transmitted bytes.
 */
export function parseNetDev(content: string): NetworkCounters {
  let sent = 0;
  let received = 0;
  let interfaces = 0;

  for (const line of content.split('\n').slice(2)) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const name = line.slice(0, separator).trim();
    if (name === 'lo') continue;

    const fields = line
      .slice(separator + 1)
      .trim()
      .split(/\s+/)
      .map(Number);
    if (fields.length < 9 || fields.some((n) => Number.isNaN(n))) continue;

    received += fields[0];
    sent += fields[8];
    interfaces++;
  }

  if (interfaces === 0) {
    throw new MetricUnavailableError('network', 'no network interfaces found');
  }

  return { bytes_sent: sent, bytes_received: received };
}

export async function readNetworkCounters(): Promise<NetworkCounters> {
  let content: string;
  try {
    content = await readFile(PROC_NET_DEV, 'utf-8');
  } catch (err) {
    throw new MetricUnavailableError('network', errorReason(err));
  }
  return parseNetDev(content);
}

/** Values in `/proc/meminfo` are kB. Returns bytes, or null when a key is absent. */
export function parseMeminfo(content: string): MemoryReading | null {
  const values = new Map<string, number>();
  for (const line of content.split('\n')) {
    const match = /^(\w+):\s+(\d+)/.exec(line);
    if (match) values.set(match[1], Number(match[2]) * 1024);
  }

  const total = values.get('MemTotal');
  const available = values.get('MemAvailable');
  if (total === undefined || available === undefined) return null;
  return { total, available };
}

export async function readMemory(): Promise<MemoryReading> {
  try {
    const parsed = parseMeminfo(await readFile(PROC_MEMINFO, 'utf-8'));
    if (parsed) return parsed;
  } catch {
    // not Linux; fall through to the os module
  }
  return { total: totalmem(), available: freemem() };
}

export async function readDisk(path: string): Promise<DiskReading> {
  try {
    return diskFromBlocks(await statfs(path));
  } catch (err) {
    throw new MetricUnavailableError('disk', errorReason(err));
  }
}

export function diskFromBlocks(stats: BlockCounts): DiskReading {
  return {
    total: stats.blocks * stats.bsize,
    used: (stats.blocks - stats.bfree) * stats.bsize,
    free: stats.bavail * stats.bsize,
  };
}

/** Boot time in epoch milliseconds. */
export function readBootTime(): number {
  return Date.now() - uptime() * 1000;
}

/** Aggregate idle and total CPU time across all cores, in ms. */
export function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus()) {
    idle += cpu.times.idle;
    total += cpu.times.user + cpu.times.nice + cpu.times.sys + cpu.times.idle + cpu.times.irq;
  }
  return { idle, total };
}

function errorReason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
