/** Persisted agent configuration, stored as JSON with these exact keys. */
export interface SentinelConfig {
  port: number;
  password_hash: string;
  created_at: string;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** Runtime settings derived from the environment. Durations are in milliseconds. */
export interface AgentSettings {
  home: string;
  configFile: string;
  host: string;
  logLevel: LogLevel;
  logFile?: string;
  diskPath: string;
  cpuSampleInterval: number;
  updateTimeout: number;
  upgradeTimeout: number;
  updateCommand: string[];
  upgradeCommand: string[];
  rebootCommand: string[];
}
