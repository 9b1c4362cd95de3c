import { roundTo } from '@sentinel/shared';
import type { NetworkCounters, NetworkRate, NetworkSample } from '@sentinel/shared';
import { readNetworkCounters } from './sources.js';

export type CounterReader = () => Promise<NetworkCounters>;

/** Returns seconds on a clock that never jumps backwards with wall time. */
export type Clock = () => number;

export const monotonicSeconds: Clock = () => Number(process.hrtime.bigint()) / 1e9;

/**
 * Outbound throughput in kbit/s between two samples.
 *
 * Returns 0 when there is no previous sample, when no time has elapsed, and
 * when the counter went backwards (interface reset or wraparound).
 */
export function computeOutboundRate(
  previous: NetworkSample | null,
  current: NetworkCounters,
  observedAt: number,
): number {
  if (!previous) return 0;

  const elapsed = observedAt - previous.observed_at;
  if (elapsed <= 0) return 0;

  const delta = current.bytes_sent - previous.bytes_sent;
  if (delta <= 0) return 0;

  return roundTo((delta * 8) / (1024 * elapsed));
}

/**
 * Holds the last observed network counters and turns each new reading into an
 * instantaneous rate. Samples are applied strictly one after another: reading
 * the counters, reading the clock and replacing the baseline happen as one unit,
 * even when several metrics requests arrive at once.
 */
export class RateSampler {
  private readonly readCounters: CounterReader;
  private readonly now: Clock;
  private baseline: NetworkSample | null = null;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(readCounters: CounterReader = readNetworkCounters, now: Clock = monotonicSeconds) {
    this.readCounters = readCounters;
    this.now = now;
  }

  /**
   * Take a sample. When `counters` is given it is used instead of reading the
   * system counters.
   */
  sample(counters?: NetworkCounters): Promise<NetworkRate> {
    const run = this.queue.then(() => this.step(counters));
    // A failed read must not wedge the queue for later callers.
    this.queue = run.catch(() => undefined);
    return run;
  }

  getBaseline(): NetworkSample | null {
    return this.baseline ? { ...this.baseline } : null;
  }

  private async step(counters?: NetworkCounters): Promise<NetworkRate> {
    const current = counters ?? (await this.readCounters());
    const observedAt = this.now();

    const rate = computeOutboundRate(this.baseline, current, observedAt);

    this.baseline = {
      bytes_sent: current.bytes_sent,
      bytes_received: current.bytes_received,
      observed_at: observedAt,
    };

    return {
      bytes_sent: current.bytes_sent,
      bytes_received: current.bytes_received,
      outbound_kbits_per_sec: rate,
    };
  }
}
