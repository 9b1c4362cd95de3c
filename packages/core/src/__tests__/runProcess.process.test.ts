import { describe, it, expect } from 'vitest';
import { runProcess } from '../commands/runProcess.js';
import { CommandExecutor } from '../commands/CommandExecutor.js';

// A shell that backgrounds a sleeper keeps the output pipes open after the
// shell itself is gone.
const LINGERING = ['sh', '-c', 'sleep 8 & exec sleep 8'];

describe.skipIf(process.platform === 'win32')('runProcess with real processes', () => {
  it('should capture output and the exit code', async () => {
    const result = await runProcess(['sh', '-c', 'echo hello; echo oops >&2; exit 3'], {
      timeout: 5000,
    });

    expect(result).toEqual({
      exitCode: 3,
      signal: null,
      stdout: 'hello\n',
      stderr: 'oops\n',
      timedOut: false,
    });
  });

  it('should return promptly when a timed-out command has a background child', async () => {
    const started = Date.now();

    const result = await runProcess(LINGERING, { timeout: 200, killTimeout: 200 });

    expect(result.timedOut).toBe(true);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('should accept a new update right after one timed out', async () => {
    const executor = new CommandExecutor({
      updateCommand: LINGERING,
      upgradeCommand: ['true'],
      updateTimeout: 200,
    });

    const first = await executor.runUpdate();
    expect(first.outcome).toBe('timed-out');
    expect(executor.isUpdating()).toBe(false);

    const second = await executor.runUpdate();
    expect(second.outcome).toBe('timed-out');
  });
});
