import { spawn } from 'node:child_process';
import { DEFAULT_KILL_TIMEOUT, getLogger } from '@sentinel/shared';
import type { ProcessOutput } from '@sentinel/shared';
import { terminate } from './terminate.js';

const logger = getLogger();

export interface RunOptions {
  timeout: number;
  killTimeout?: number;
}

/**
 * Run a command to completion, collecting its output. The command runs in its
 * own process group. A run that outlives `timeout` has the whole group
 * terminated and resolves with `timedOut: true` as soon as the command itself
 * is gone, even if a descendant still holds its output pipes. Only a failure
 * to start the process rejects.
 */
export function runProcess(argv: readonly string[], options: RunOptions): Promise<ProcessOutput> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error('Empty command'));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, DEBIAN_FRONTEND: 'noninteractive' },
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    const finish = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        exitCode: code,
        signal,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        timedOut,
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn({ command: argv.join(' '), timeout: options.timeout }, 'Command timed out, terminating');
      terminate(child, options.killTimeout ?? DEFAULT_KILL_TIMEOUT, { group: true })
        .catch((err: unknown) => {
          logger.error({ err, command: argv.join(' ') }, 'Failed to terminate command');
        })
        .finally(() => {
          child.stdout?.destroy();
          child.stderr?.destroy();
          finish(child.exitCode, child.signalCode);
        });
    }, options.timeout);
    timer.unref();

    child.once('error', (err) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(err);
    });

    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => finish(code, signal));
  });
}

/**
 * Start a command that is expected to outlive the agent. Resolves once the
 * process has been spawned; the agent keeps no reference to it.
 */
export function launchDetached(argv: readonly string[]): Promise<void> {
  const [command, ...args] = argv;
  if (!command) {
    return Promise.reject(new Error('Empty command'));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });

    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
