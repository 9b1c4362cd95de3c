import type { ChildProcess } from 'node:child_process';
import { DEFAULT_KILL_TIMEOUT } from '@sentinel/shared';

export interface TerminateOptions {
  /** Signal the child's whole process group. The child must have been spawned detached. */
  group?: boolean;
}

function sendSignal(child: ChildProcess, signal: NodeJS.Signals, group: boolean): boolean {
  if (!group || child.pid === undefined) {
    return child.kill(signal);
  }
  try {
    process.kill(-child.pid, signal);
    return true;
  } catch {
    // ESRCH: the group is already gone
    return false;
  }
}

/**
 * Stop a child process: SIGTERM first, SIGKILL if it is still running after
 * `timeout` ms. Resolves with the exit code, or null when killed.
 */
export function terminate(
  child: ChildProcess,
  timeout: number = DEFAULT_KILL_TIMEOUT,
  options: TerminateOptions = {},
): Promise<number | null> {
  const group = options.group ?? false;

  return new Promise((resolve) => {
    let resolved = false;

    const done = (code: number | null) => {
      if (!resolved) {
        resolved = true;
        resolve(code);
      }
    };

    if (child.exitCode !== null || child.signalCode !== null) {
      done(child.exitCode);
      return;
    }

    child.once('exit', (code: number | null) => done(code));

    if (!sendSignal(child, 'SIGTERM', group)) {
      done(null);
      return;
    }

    const killTimer = setTimeout(() => {
      if (resolved) return;
      sendSignal(child, 'SIGKILL', group);
      // Give SIGKILL a moment to take effect
      const settleTimer = setTimeout(() => done(null), 500);
      settleTimer.unref();
    }, timeout);

    killTimer.unref();
  });
}
