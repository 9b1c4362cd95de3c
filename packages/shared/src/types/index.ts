export type {
  MetricsSnapshot,
  MemoryUsage,
  DiskUsage,
  NetworkUsage,
  UptimeInfo,
  NetworkCounters,
  NetworkSample,
  NetworkRate,
} from './metrics.js';

export type { SentinelConfig, AgentSettings, LogLevel } from './config.js';

export type { CommandResult, CommandOutcome, ProcessOutput } from './commands.js';

export type { HealthResponse, InfoResponse, ErrorResponse, AuthOutcome } from './api.js';
