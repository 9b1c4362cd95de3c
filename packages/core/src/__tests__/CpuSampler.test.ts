import { describe, it, expect, vi, afterEach } from 'vitest';
import { CpuSampler, computeCpuPercent } from '../metrics/CpuSampler.js';
import type { CpuTimes } from '../metrics/sources.js';

function timesReader(...readings: CpuTimes[]): () => CpuTimes {
  let index = 0;
  return vi.fn(() => {
    const reading = readings[Math.min(index, readings.length - 1)];
    index++;
    return reading ?? { idle: 0, total: 0 };
  });
}

describe('computeCpuPercent', () => {
  it('should return the busy share of the elapsed time', () => {
    expect(computeCpuPercent({ idle: 100, total: 200 }, { idle: 175, total: 300 })).toBe(25);
  });

  it('should round to one decimal', () => {
    // busy 1 of 3 = 33.33...
    expect(computeCpuPercent({ idle: 0, total: 0 }, { idle: 2, total: 3 })).toBe(33.3);
  });

  it('should return 0 when no time has elapsed', () => {
    expect(computeCpuPercent({ idle: 5, total: 10 }, { idle: 5, total: 10 })).toBe(0);
  });
});

describe('CpuSampler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report utilization since construction before the first refresh', () => {
    const sampler = new CpuSampler(
      timesReader({ idle: 0, total: 0 }, { idle: 50, total: 100 }),
    );

    expect(sampler.getLatest()).toBe(50);
  });

  it('should serve the last refreshed window', () => {
    const read = timesReader(
      { idle: 0, total: 0 },
      { idle: 90, total: 100 },
      { idle: 90, total: 200 },
    );
    const sampler = new CpuSampler(read);

    expect(sampler.refresh()).toBe(10);
    expect(sampler.getLatest()).toBe(10);
    expect(sampler.refresh()).toBe(100);
    expect(sampler.getLatest()).toBe(100);
  });

  it('should refresh on the configured interval until stopped', () => {
    vi.useFakeTimers();
    const read = timesReader({ idle: 0, total: 0 });
    const sampler = new CpuSampler(read);

    sampler.start(1000);
    vi.advanceTimersByTime(3000);
    expect(read).toHaveBeenCalledTimes(4);

    sampler.stop();
    vi.advanceTimersByTime(3000);
    expect(read).toHaveBeenCalledTimes(4);
  });
});
