import {
  SENTINEL_ENDPOINTS,
  SENTINEL_SERVICE_ID,
  SENTINEL_SERVICE_NAME,
  SENTINEL_VERSION,
  UnauthorizedError,
  getLogger,
} from '@sentinel/shared';
import type {
  AuthOutcome,
  CommandResult,
  HealthResponse,
  InfoResponse,
  MetricsSnapshot,
} from '@sentinel/shared';
import type { AccessGuard } from '../auth/AccessGuard.js';
import type { CommandExecutor } from '../commands/CommandExecutor.js';
import type { MetricsCollector } from '../metrics/MetricsCollector.js';

const logger = getLogger();

export type OperationName = 'health' | 'info' | 'metrics' | 'update' | 'reboot';

export const OPERATIONS: Record<OperationName, { requiresAuth: boolean }> = {
  health: { requiresAuth: false },
  info: { requiresAuth: false },
  metrics: { requiresAuth: true },
  update: { requiresAuth: true },
  reboot: { requiresAuth: true },
};

/** The agent's operations, independent of how they are exposed. */
export class ServiceFacade {
  private readonly guard: AccessGuard;
  private readonly collector: MetricsCollector;
  private readonly executor: CommandExecutor;
  private readonly now: () => Date;

  constructor(
    guard: AccessGuard,
    collector: MetricsCollector,
    executor: CommandExecutor,
    now: () => Date = () => new Date(),
  ) {
    this.guard = guard;
    this.collector = collector;
    this.executor = executor;
    this.now = now;
  }

  health(): HealthResponse {
    return {
      status: 'healthy',
      service: SENTINEL_SERVICE_ID,
      timestamp: this.now().toISOString(),
    };
  }

  info(): InfoResponse {
    return {
      service: SENTINEL_SERVICE_NAME,
      version: SENTINEL_VERSION,
      endpoints: [...SENTINEL_ENDPOINTS],
      authentication: 'Bearer token required for protected endpoints',
    };
  }

  metrics(): Promise<MetricsSnapshot> {
    return this.collector.collect();
  }

  update(): Promise<CommandResult> {
    logger.info('System update requested');
    return this.executor.runUpdate();
  }

  reboot(): Promise<CommandResult> {
    logger.warn('System reboot requested');
    return this.executor.runReboot();
  }

  authenticate(header: string | undefined): Promise<AuthOutcome> {
    return this.guard.check(header);
  }

  /**
   * Throw UnauthorizedError unless the header grants access to the operation.
   * Missing and wrong credentials produce the same error.
   */
  async requireAccess(operation: OperationName, header: string | undefined): Promise<void> {
    if (!OPERATIONS[operation].requiresAuth) return;

    const outcome = await this.guard.check(header);
    if (outcome !== 'ok') {
      logger.warn({ operation, outcome }, 'Rejected unauthenticated request');
      throw new UnauthorizedError();
    }
  }
}
