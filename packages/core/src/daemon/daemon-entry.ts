#!/usr/bin/env node

import { createLogger, setDefaultLogger } from '@sentinel/shared';
import { loadSettings } from '../config/settings.js';

async function main(): Promise<void> {
  const settings = loadSettings();

  // Modules take their logger at load time, so it must be configured before they are imported.
  setDefaultLogger(
    createLogger({
      level: settings.logLevel,
      destination: settings.logFile,
      pretty: process.env.NODE_ENV !== 'production',
    }),
  );

  const { SentinelDaemon } = await import('./Daemon.js');
  const daemon = new SentinelDaemon(settings);
  await daemon.start();
}

main().catch((err: unknown) => {
  const reason = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Sentinel agent failed to start: ${reason}\n`);
  process.exit(1);
});
