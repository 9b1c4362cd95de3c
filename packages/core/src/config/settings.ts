import { join } from 'node:path';
import {
  DEFAULT_SENTINEL_HOME,
  REBOOT_COMMAND,
  SettingsValidationError,
  UPDATE_COMMAND,
  UPGRADE_COMMAND,
  agentEnvSchema,
  parseDuration,
} from '@sentinel/shared';
import type { AgentSettings } from '@sentinel/shared';

export const CONFIG_FILE_NAME = 'config.json';

/** Read and validate the agent's runtime settings from environment variables. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): AgentSettings {
  const result = agentEnvSchema.safeParse(env);
  if (!result.success) {
    throw new SettingsValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const parsed = result.data;
  const home = parsed.SENTINEL_HOME ?? DEFAULT_SENTINEL_HOME;

  return {
    home,
    configFile: parsed.SENTINEL_CONFIG_FILE ?? join(home, CONFIG_FILE_NAME),
    host: parsed.SENTINEL_BIND_HOST,
    logLevel: parsed.SENTINEL_LOG_LEVEL,
    logFile: parsed.SENTINEL_LOG_FILE,
    diskPath: parsed.SENTINEL_DISK_PATH,
    cpuSampleInterval: parseDuration(parsed.SENTINEL_CPU_INTERVAL),
    updateTimeout: parseDuration(parsed.SENTINEL_UPDATE_TIMEOUT),
    upgradeTimeout: parseDuration(parsed.SENTINEL_UPGRADE_TIMEOUT),
    updateCommand: [...UPDATE_COMMAND],
    upgradeCommand: [...UPGRADE_COMMAND],
    rebootCommand: [...REBOOT_COMMAND],
  };
}
