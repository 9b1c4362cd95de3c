import { roundTo } from '@sentinel/shared';
import { readCpuTimes } from './sources.js';
import type { CpuTimes } from './sources.js';

export function computeCpuPercent(previous: CpuTimes, current: CpuTimes): number {
  const totalDiff = current.total - previous.total;
  const idleDiff = current.idle - previous.idle;
  if (totalDiff <= 0) return 0;

  const percent = ((totalDiff - idleDiff) / totalDiff) * 100;
  return roundTo(Math.min(100, Math.max(0, percent)), 1);
}

/**
 * Refreshes CPU utilization on a timer so that metrics requests read the last
 * window instead of blocking for one.
 */
export class CpuSampler {
  private readonly readTimes: () => CpuTimes;
  private timer: NodeJS.Timeout | null = null;
  private lastTimes: CpuTimes;
  private latest: number | null = null;

  constructor(readTimes: () => CpuTimes = readCpuTimes) {
    this.readTimes = readTimes;
    this.lastTimes = readTimes();
  }

  start(interval: number): void {
    this.stop();
    this.timer = setInterval(() => this.refresh(), interval);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  refresh(): number {
    const current = this.readTimes();
    this.latest = computeCpuPercent(this.lastTimes, current);
    this.lastTimes = current;
    return this.latest;
  }

  /**
   * Utilization over the last completed window. Before the first window closes,
   * utilization since construction.
   */
  getLatest(): number {
    if (this.latest !== null) return this.latest;
    return computeCpuPercent(this.lastTimes, this.readTimes());
  }
}
