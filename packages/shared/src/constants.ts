export const DEFAULT_SENTINEL_HOME = '/etc/sentinel-server';

export const SENTINEL_SERVICE_ID = 'sentinel-server';
export const SYSTEMD_UNIT_DIR = '/etc/systemd/system';
export const SENTINEL_SERVICE_NAME = 'Sentinel Server';
export const SENTINEL_VERSION = '1.0.0';

export const DEFAULT_BIND_HOST = '0.0.0.0';
export const DEFAULT_DISK_PATH = '/';
export const DEFAULT_CPU_SAMPLE_INTERVAL = '1s';
export const DEFAULT_UPDATE_TIMEOUT = '5m';
export const DEFAULT_UPGRADE_TIMEOUT = '30m';
export const DEFAULT_KILL_TIMEOUT = 5000;

export const UPDATE_COMMAND = ['sudo', 'apt', 'update', '-y'];
export const UPGRADE_COMMAND = ['sudo', 'apt', 'upgrade', '-y'];
export const REBOOT_COMMAND = ['sudo', 'reboot'];

export const PORT_RANGE_MIN = 10000;
export const PORT_RANGE_MAX = 65535;
export const PORT_FALLBACK_MIN = 50000;
export const PORT_FALLBACK_MAX = 60000;
export const PORT_SEARCH_ATTEMPTS = 100;

/** Inclusive port intervals never chosen automatically. */
export const RESERVED_PORT_RANGES: ReadonlyArray<readonly [number, number]> = [
  [1, 1023],
  [3000, 3010],
  [5000, 5010],
  [8000, 8010],
  [8080, 8090],
  [9000, 9010],
];

export const CREDENTIAL_LENGTH = 8;
export const CREDENTIAL_ALPHABET =
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

export const SENTINEL_ENDPOINTS = ['/health', '/metrics', '/update', '/reboot', '/info'] as const;

export const DEFAULT_CLIENT_TIMEOUT = 10_000;
export const UPDATE_CLIENT_TIMEOUT = 30 * 60 * 1000;
export const DEFAULT_MONITOR_INTERVAL = 30;
