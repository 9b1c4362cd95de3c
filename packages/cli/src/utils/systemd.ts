import { join } from 'node:path';
import { SENTINEL_SERVICE_ID, SYSTEMD_UNIT_DIR } from '@sentinel/shared';

export const UNIT_NAME = `${SENTINEL_SERVICE_ID}.service`;
export const UNIT_PATH = join(SYSTEMD_UNIT_DIR, UNIT_NAME);

export interface SystemdUnitOptions {
  /** Absolute command line that starts the agent. */
  execStart: string;
  user: string;
  home: string;
}

export function generateSystemdUnit(options: SystemdUnitOptions): string {
  return `[Unit]
Description=Sentinel Server host agent
After=network-online.target
Wants=network-online.target

[Service]
Type=simple
User=${options.user}
Environment=NODE_ENV=production
Environment=SENTINEL_HOME=${options.home}
ExecStart=${options.execStart}
Restart=on-failure
RestartSec=5

[Install]
WantedBy=multi-user.target
`;
}
