import { getLogger } from '@sentinel/shared';
import type { AgentSettings } from '@sentinel/shared';
import { ConfigStore } from '../config/ConfigStore.js';
import { AccessGuard } from '../auth/AccessGuard.js';
import { CpuSampler } from '../metrics/CpuSampler.js';
import { RateSampler } from '../metrics/RateSampler.js';
import { MetricsCollector } from '../metrics/MetricsCollector.js';
import { CommandExecutor } from '../commands/CommandExecutor.js';
import { ServiceFacade } from '../service/ServiceFacade.js';
import { HTTPServer } from '../api/HTTPServer.js';
import { formatBanner, resolveHostAddress } from './banner.js';

const logger = getLogger();

export interface AgentServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface DaemonOptions {
  store?: ConfigStore;
  createServer?: (facade: ServiceFacade, port: number, host: string) => AgentServer;
  write?: (text: string) => void;
  handleSignals?: boolean;
}

export class SentinelDaemon {
  private settings: AgentSettings;
  private store: ConfigStore;
  private createServer: (facade: ServiceFacade, port: number, host: string) => AgentServer;
  private write: (text: string) => void;
  private handleSignals: boolean;
  private cpuSampler: CpuSampler | null = null;
  private httpServer: AgentServer | null = null;
  private running: boolean = false;

  constructor(settings: AgentSettings, options: DaemonOptions = {}) {
    this.settings = settings;
    this.store = options.store ?? new ConfigStore(settings.configFile);
    this.createServer =
      options.createServer ?? ((facade, port, host) => new HTTPServer(facade, port, host));
    this.write = options.write ?? ((text) => process.stdout.write(text));
    this.handleSignals = options.handleSignals ?? true;
  }

  async start(): Promise<void> {
    if (this.running) return;

    logger.info('Sentinel agent starting...');

    // 1. Load or generate the persisted configuration
    const { config, credential } = await this.store.loadOrCreate();

    // 2. Banner, with the password only on the run that generated it
    this.write(
      formatBanner({
        address: resolveHostAddress(),
        port: config.port,
        password: credential?.reveal() ?? undefined,
      }),
    );

    // 3. Samplers. The network baseline is taken now so the first request reports a rate.
    this.cpuSampler = new CpuSampler();
    this.cpuSampler.start(this.settings.cpuSampleInterval);
    const rateSampler = new RateSampler();
    try {
      await rateSampler.sample();
    } catch (err) {
      logger.debug({ err }, 'Network counters not available');
    }

    // 4. Service
    const facade = new ServiceFacade(
      new AccessGuard(config.password_hash),
      new MetricsCollector(this.cpuSampler, rateSampler, { diskPath: this.settings.diskPath }),
      new CommandExecutor({
        updateCommand: this.settings.updateCommand,
        upgradeCommand: this.settings.upgradeCommand,
        rebootCommand: this.settings.rebootCommand,
        updateTimeout: this.settings.updateTimeout,
        upgradeTimeout: this.settings.upgradeTimeout,
      }),
    );

    // 5. HTTP server
    const server = this.createServer(facade, config.port, this.settings.host);
    try {
      await server.start();
    } catch (err) {
      this.cpuSampler.stop();
      this.cpuSampler = null;
      throw err;
    }
    this.httpServer = server;

    if (this.handleSignals) {
      this.setupSignalHandlers();
    }

    this.running = true;
    logger.info({ pid: process.pid, port: config.port }, 'Sentinel agent started');
  }

  async stop(): Promise<void> {
    if (!this.running) return;

    logger.info('Sentinel agent stopping...');
    this.running = false;

    this.cpuSampler?.stop();
    await this.httpServer?.stop();

    logger.info('Sentinel agent stopped');
  }

  private setupSignalHandlers(): void {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal }, 'Received shutdown signal');
      this.stop()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}
