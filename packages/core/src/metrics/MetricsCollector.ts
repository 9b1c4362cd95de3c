import {
  DEFAULT_DISK_PATH,
  formatTimedelta,
  getLogger,
  roundTo,
  toGigabytes,
} from '@sentinel/shared';
import type {
  DiskUsage,
  MemoryUsage,
  MetricsSnapshot,
  NetworkUsage,
  UptimeInfo,
} from '@sentinel/shared';
import type { CpuSampler } from './CpuSampler.js';
import type { RateSampler } from './RateSampler.js';
import { readBootTime, readDisk, readMemory } from './sources.js';
import type { DiskReading, MemoryReading } from './sources.js';

const logger = getLogger();

export interface MetricsSources {
  readMemory: () => Promise<MemoryReading>;
  readDisk: (path: string) => Promise<DiskReading>;
  readBootTime: () => number;
  now: () => Date;
}

export interface MetricsCollectorOptions {
  diskPath?: string;
  sources?: Partial<MetricsSources>;
}

const EMPTY_MEMORY: MemoryUsage = { total_gb: 0, used_gb: 0, available_gb: 0, percentage: 0 };
const EMPTY_DISK: DiskUsage = { total_gb: 0, used_gb: 0, free_gb: 0, percentage: 0 };
const EMPTY_NETWORK: NetworkUsage = {
  outbound_kbits_per_sec: 0,
  total_sent_gb: 0,
  total_received_gb: 0,
};

/**
 * Builds one MetricsSnapshot per call. Each sub-metric is read on its own; one
 * that cannot be read on this host is reported as zeros and the rest of the
 * snapshot is still returned.
 */
export class MetricsCollector {
  private cpuSampler: CpuSampler;
  private rateSampler: RateSampler;
  private diskPath: string;
  private sources: MetricsSources;

  constructor(
    cpuSampler: CpuSampler,
    rateSampler: RateSampler,
    options: MetricsCollectorOptions = {},
  ) {
    this.cpuSampler = cpuSampler;
    this.rateSampler = rateSampler;
    this.diskPath = options.diskPath ?? DEFAULT_DISK_PATH;
    this.sources = {
      readMemory,
      readDisk,
      readBootTime,
      now: () => new Date(),
      ...options.sources,
    };
  }

  async collect(): Promise<MetricsSnapshot> {
    const now = this.sources.now();

    const [memory, disk, network] = await Promise.all([
      this.degrade('memory', () => this.memoryUsage(), EMPTY_MEMORY),
      this.degrade('disk', () => this.diskUsage(), EMPTY_DISK),
      this.degrade('network', () => this.networkUsage(), EMPTY_NETWORK),
    ]);

    const cpu = await this.degrade('cpu', async () => this.cpuSampler.getLatest(), 0);
    const uptime = await this.degrade('uptime', async () => this.uptime(now), {
      uptime_seconds: 0,
      uptime_formatted: formatTimedelta(0),
      boot_time: '',
    });

    return {
      timestamp: now.toISOString(),
      cpu,
      memory,
      disk,
      network,
      uptime,
    };
  }

  private async memoryUsage(): Promise<MemoryUsage> {
    const { total, available } = await this.sources.readMemory();
    const used = Math.max(0, total - available);
    return {
      total_gb: toGigabytes(total),
      used_gb: toGigabytes(used),
      available_gb: toGigabytes(available),
      percentage: total > 0 ? roundTo((used / total) * 100, 1) : 0,
    };
  }

  private async diskUsage(): Promise<DiskUsage> {
    const { total, used, free } = await this.sources.readDisk(this.diskPath);
    return {
      total_gb: toGigabytes(total),
      used_gb: toGigabytes(used),
      free_gb: toGigabytes(free),
      percentage: total > 0 ? roundTo((used / total) * 100) : 0,
    };
  }

  private async networkUsage(): Promise<NetworkUsage> {
    const rate = await this.rateSampler.sample();
    return {
      outbound_kbits_per_sec: rate.outbound_kbits_per_sec,
      total_sent_gb: toGigabytes(rate.bytes_sent),
      total_received_gb: toGigabytes(rate.bytes_received),
    };
  }

  private uptime(now: Date): UptimeInfo {
    const bootTime = this.sources.readBootTime();
    const seconds = Math.max(0, Math.floor((now.getTime() - bootTime) / 1000));
    return {
      uptime_seconds: seconds,
      uptime_formatted: formatTimedelta(seconds),
      boot_time: new Date(bootTime).toISOString(),
    };
  }

  private async degrade<T>(metric: string, read: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await read();
    } catch (err) {
      logger.debug({ err, metric }, 'Metric unavailable, reporting zeros');
      return fallback;
    }
  }
}
