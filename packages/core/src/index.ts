// Metrics
export { RateSampler, computeOutboundRate, monotonicSeconds } from './metrics/RateSampler.js';
export type { CounterReader, Clock } from './metrics/RateSampler.js';
export { CpuSampler, computeCpuPercent } from './metrics/CpuSampler.js';
export { MetricsCollector } from './metrics/MetricsCollector.js';
export type { MetricsSources, MetricsCollectorOptions } from './metrics/MetricsCollector.js';
export {
  parseNetDev,
  parseMeminfo,
  readNetworkCounters,
  readMemory,
  readDisk,
  readBootTime,
  readCpuTimes,
} from './metrics/sources.js';

// Configuration
export { ConfigStore } from './config/ConfigStore.js';
export type { LoadedConfig, ConfigStoreOptions } from './config/ConfigStore.js';
export { findAvailablePort, isReservedPort, isPortBindable, randomPort } from './config/portFinder.js';
export { loadSettings } from './config/settings.js';

// Authentication
export { AccessGuard } from './auth/AccessGuard.js';
export { OneTimeCredential } from './auth/OneTimeCredential.js';
export {
  generateCredential,
  hashCredential,
  verifyCredential,
  parseCredentialHash,
} from './auth/credentials.js';

// Commands
export { CommandExecutor } from './commands/CommandExecutor.js';
export type { CommandRunner, CommandExecutorOptions } from './commands/CommandExecutor.js';
export { runProcess, launchDetached } from './commands/runProcess.js';
export { terminate } from './commands/terminate.js';

// Service
export { ServiceFacade, OPERATIONS } from './service/ServiceFacade.js';
export type { OperationName } from './service/ServiceFacade.js';

// HTTP API
export { HTTPServer, buildApp } from './api/HTTPServer.js';

// Daemon
export { SentinelDaemon } from './daemon/Daemon.js';
export { formatBanner, resolveHostAddress } from './daemon/banner.js';
