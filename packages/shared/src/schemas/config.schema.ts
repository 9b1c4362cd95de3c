import { z } from 'zod';
import ms from 'ms';
import {
  DEFAULT_BIND_HOST,
  DEFAULT_CPU_SAMPLE_INTERVAL,
  DEFAULT_DISK_PATH,
  DEFAULT_UPDATE_TIMEOUT,
  DEFAULT_UPGRADE_TIMEOUT,
} from '../constants.js';

export const sentinelConfigSchema = z.object({
  port: z.number().int().min(1).max(65535),
  password_hash: z.string().min(1),
  created_at: z
    .string()
    .min(1)
    .refine((value) => !Number.isNaN(Date.parse(value)), 'Expected an ISO-8601 timestamp'),
});

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const durationSchema = z
  .string()
  .min(1)
  .refine((value) => {
    if (value.trim().length === 0) return false;
    const parsed = ms(value);
    return typeof parsed === 'number' && Number.isFinite(parsed) && parsed > 0;
  }, 'Expected a positive duration such as "30s", "5m" or "1h"');

/** Environment variables read by the agent at startup. */
export const agentEnvSchema = z.object({
  SENTINEL_HOME: z.string().min(1).optional(),
  SENTINEL_CONFIG_FILE: z.string().min(1).optional(),
  SENTINEL_BIND_HOST: z.string().min(1).default(DEFAULT_BIND_HOST),
  SENTINEL_LOG_LEVEL: logLevelSchema.default('info'),
  SENTINEL_LOG_FILE: z.string().min(1).optional(),
  SENTINEL_DISK_PATH: z.string().min(1).default(DEFAULT_DISK_PATH),
  SENTINEL_CPU_INTERVAL: durationSchema.default(DEFAULT_CPU_SAMPLE_INTERVAL),
  SENTINEL_UPDATE_TIMEOUT: durationSchema.default(DEFAULT_UPDATE_TIMEOUT),
  SENTINEL_UPGRADE_TIMEOUT: durationSchema.default(DEFAULT_UPGRADE_TIMEOUT),
});
