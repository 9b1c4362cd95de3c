import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { SENTINEL_SERVICE_ID } from '../constants.js';
import type { LogLevel } from '../types/config.js';

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Human-readable output on stdout. Ignored when `destination` is set. */
  pretty?: boolean;
  /** Log file; its directory is created when missing. */
  destination?: string;
}

/** Log fields that may carry the agent credential. */
export const REDACTED_PATHS = ['password', 'credential', '*.password', 'req.headers.authorization'];

function agentOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    base: { service: SENTINEL_SERVICE_ID, pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { level = 'info', pretty = false, destination } = options;

  if (destination) {
    return pino(agentOptions(level), pino.destination({ dest: destination, mkdir: true, sync: true }));
  }

  if (pretty) {
    return pino({
      ...agentOptions(level),
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
          ignore: 'pid,hostname,service',
        },
      },
    });
  }

  return pino(agentOptions(level));
}

let agentLogger: Logger | null = null;

/** The process-wide logger. Pretty unless NODE_ENV is production. */
export function getLogger(): Logger {
  if (!agentLogger) {
    agentLogger = createLogger({ pretty: process.env.NODE_ENV !== 'production' });
  }
  return agentLogger;
}

export function setDefaultLogger(logger: Logger): void {
  agentLogger = logger;
}
