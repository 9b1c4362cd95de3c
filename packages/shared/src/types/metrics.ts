export interface MemoryUsage {
  total_gb: number;
  used_gb: number;
  available_gb: number;
  percentage: number;
}

export interface DiskUsage {
  total_gb: number;
  used_gb: number;
  free_gb: number;
  percentage: number;
}

export interface NetworkUsage {
  outbound_kbits_per_sec: number;
  total_sent_gb: number;
  total_received_gb: number;
}

export interface UptimeInfo {
  uptime_seconds: number;
  uptime_formatted: string;
  boot_time: string;
}

/**
 * One aggregate reading of the host. Keys match the JSON the agent has always
 * served, so existing dashboards and display panels keep working.
 */
export interface MetricsSnapshot {
  timestamp: string;
  /** Utilization in percent across all cores. */
  cpu: number;
  memory: MemoryUsage;
  disk: DiskUsage;
  network: NetworkUsage;
  uptime: UptimeInfo;
}

/** Cumulative interface counters, summed over every non-loopback interface. */
export interface NetworkCounters {
  bytes_sent: number;
  bytes_received: number;
}

export interface NetworkSample extends NetworkCounters {
  /** Seconds on a monotonic clock. */
  observed_at: number;
}

export interface NetworkRate extends NetworkCounters {
  outbound_kbits_per_sec: number;
}
