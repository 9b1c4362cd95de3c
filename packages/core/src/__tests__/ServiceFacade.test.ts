import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UnauthorizedError } from '@sentinel/shared';
import { OPERATIONS, ServiceFacade } from '../service/ServiceFacade.js';

function createMockGuard() {
  return { check: vi.fn().mockResolvedValue('ok') };
}

function createMockCollector() {
  return { collect: vi.fn().mockResolvedValue({ cpu: 12.5 }) };
}

function createMockExecutor() {
  return {
    runUpdate: vi.fn().mockResolvedValue({ success: true, outcome: 'succeeded' }),
    runReboot: vi.fn().mockResolvedValue({
      success: true,
      outcome: 'initiated',
      message: 'Reboot initiated',
    }),
  };
}

describe('ServiceFacade', () => {
  let guard: ReturnType<typeof createMockGuard>;
  let collector: ReturnType<typeof createMockCollector>;
  let executor: ReturnType<typeof createMockExecutor>;
  let facade: ServiceFacade;

  beforeEach(() => {
    guard = createMockGuard();
    collector = createMockCollector();
    executor = createMockExecutor();
    facade = new ServiceFacade(
      guard as never,
      collector as never,
      executor as never,
      () => new Date('2026-05-04T03:02:01.000Z'),
    );
  });

  it('should report health', () => {
    expect(facade.health()).toEqual({
      status: 'healthy',
      service: 'sentinel-server',
      timestamp: '2026-05-04T03:02:01.000Z',
    });
  });

  it('should describe the service', () => {
    expect(facade.info()).toEqual({
      service: 'Sentinel Server',
      version: '1.0.0',
      endpoints: ['/health', '/metrics', '/update', '/reboot', '/info'],
      authentication: 'Bearer token required for protected endpoints',
    });
  });

  it('should collect a fresh snapshot on every metrics call', async () => {
    await facade.metrics();
    await facade.metrics();

    expect(collector.collect).toHaveBeenCalledTimes(2);
  });

  it('should delegate update and reboot to the executor', async () => {
    expect(await facade.update()).toEqual({ success: true, outcome: 'succeeded' });
    expect((await facade.reboot()).message).toBe('Reboot initiated');
    expect(executor.runUpdate).toHaveBeenCalledTimes(1);
    expect(executor.runReboot).toHaveBeenCalledTimes(1);
  });

  describe('requireAccess', () => {
    it('should let public operations through without checking', async () => {
      await expect(facade.requireAccess('health', undefined)).resolves.toBeUndefined();
      await expect(facade.requireAccess('info', undefined)).resolves.toBeUndefined();
      expect(guard.check).not.toHaveBeenCalled();
    });

    it('should let protected operations through with a valid header', async () => {
      await expect(facade.requireAccess('metrics', 'Bearer testpass')).resolves.toBeUndefined();
      expect(guard.check).toHaveBeenCalledWith('Bearer testpass');
    });

    it.each(['unauthenticated', 'invalid'])(
      'should throw UnauthorizedError when the outcome is %s',
      async (outcome) => {
        guard.check.mockResolvedValue(outcome);

        await expect(facade.requireAccess('update', 'Bearer nope')).rejects.toBeInstanceOf(
          UnauthorizedError,
        );
      },
    );
  });

  it('should protect exactly metrics, update and reboot', () => {
    const protectedOps = Object.entries(OPERATIONS)
      .filter(([, op]) => op.requiresAuth)
      .map(([name]) => name);

    expect(protectedOps).toEqual(['metrics', 'update', 'reboot']);
  });
});
