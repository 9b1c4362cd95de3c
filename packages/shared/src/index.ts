// Types
export type {
  MetricsSnapshot,
  MemoryUsage,
  DiskUsage,
  NetworkUsage,
  UptimeInfo,
  NetworkCounters,
  NetworkSample,
  NetworkRate,
  SentinelConfig,
  AgentSettings,
  LogLevel,
  CommandResult,
  CommandOutcome,
  ProcessOutput,
  HealthResponse,
  InfoResponse,
  ErrorResponse,
  AuthOutcome,
} from './types/index.js';

// Constants
export {
  DEFAULT_SENTINEL_HOME,
  SENTINEL_SERVICE_ID,
  SYSTEMD_UNIT_DIR,
  SENTINEL_SERVICE_NAME,
  SENTINEL_VERSION,
  DEFAULT_BIND_HOST,
  DEFAULT_DISK_PATH,
  DEFAULT_CPU_SAMPLE_INTERVAL,
  DEFAULT_UPDATE_TIMEOUT,
  DEFAULT_UPGRADE_TIMEOUT,
  DEFAULT_KILL_TIMEOUT,
  UPDATE_COMMAND,
  UPGRADE_COMMAND,
  REBOOT_COMMAND,
  PORT_RANGE_MIN,
  PORT_RANGE_MAX,
  PORT_FALLBACK_MIN,
  PORT_FALLBACK_MAX,
  PORT_SEARCH_ATTEMPTS,
  RESERVED_PORT_RANGES,
  CREDENTIAL_LENGTH,
  CREDENTIAL_ALPHABET,
  SENTINEL_ENDPOINTS,
  DEFAULT_CLIENT_TIMEOUT,
  UPDATE_CLIENT_TIMEOUT,
  DEFAULT_MONITOR_INTERVAL,
} from './constants.js';

// Schemas
export {
  sentinelConfigSchema,
  agentEnvSchema,
  logLevelSchema,
  durationSchema,
} from './schemas/config.schema.js';

export {
  healthResponseSchema,
  infoResponseSchema,
  metricsSnapshotSchema,
  commandResultSchema,
  errorResponseSchema,
} from './schemas/api.schema.js';

// Utilities
export {
  parseDuration,
  formatDuration,
  roundTo,
  toGigabytes,
  formatBytes,
  formatCpu,
  formatTimedelta,
} from './utils/parser.js';

export { createLogger, getLogger, setDefaultLogger } from './utils/logger.js';
export type { CreateLoggerOptions } from './utils/logger.js';

export {
  SentinelError,
  HttpError,
  UnauthorizedError,
  NotFoundError,
  MetricUnavailableError,
  ConfigCorruptError,
  ConfigDirectoryError,
  SettingsValidationError,
  AgentRequestError,
} from './utils/errors.js';
