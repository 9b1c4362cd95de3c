import {
  DEFAULT_UPDATE_TIMEOUT,
  DEFAULT_UPGRADE_TIMEOUT,
  REBOOT_COMMAND,
  UPDATE_COMMAND,
  UPGRADE_COMMAND,
  getLogger,
  parseDuration,
} from '@sentinel/shared';
import type { CommandResult, ProcessOutput } from '@sentinel/shared';
import { launchDetached, runProcess } from './runProcess.js';
import type { RunOptions } from './runProcess.js';

const logger = getLogger();

export interface CommandRunner {
  run(argv: readonly string[], options: RunOptions): Promise<ProcessOutput>;
  launch(argv: readonly string[]): Promise<void>;
}

export interface CommandExecutorOptions {
  updateCommand?: readonly string[];
  upgradeCommand?: readonly string[];
  rebootCommand?: readonly string[];
  /** Refresh step timeout in ms. */
  updateTimeout?: number;
  /** Upgrade step timeout in ms. */
  upgradeTimeout?: number;
  runner?: CommandRunner;
}

const defaultRunner: CommandRunner = {
  run: runProcess,
  launch: launchDetached,
};

interface UpdateStep {
  name: 'update' | 'upgrade';
  argv: readonly string[];
  timeout: number;
}

/**
 * Runs the privileged host commands. Each call spawns fresh processes; the
 * only state is the in-flight update, so two updates never overlap.
 */
export class CommandExecutor {
  private readonly updateCommand: readonly string[];
  private readonly upgradeCommand: readonly string[];
  private readonly rebootCommand: readonly string[];
  private readonly updateTimeout: number;
  private readonly upgradeTimeout: number;
  private readonly runner: CommandRunner;
  private updating = false;

  constructor(options: CommandExecutorOptions = {}) {
    this.updateCommand = options.updateCommand ?? UPDATE_COMMAND;
    this.upgradeCommand = options.upgradeCommand ?? UPGRADE_COMMAND;
    this.rebootCommand = options.rebootCommand ?? REBOOT_COMMAND;
    this.updateTimeout = options.updateTimeout ?? parseDuration(DEFAULT_UPDATE_TIMEOUT);
    this.upgradeTimeout = options.upgradeTimeout ?? parseDuration(DEFAULT_UPGRADE_TIMEOUT);
    this.runner = options.runner ?? defaultRunner;
  }

  isUpdating(): boolean {
    return this.updating;
  }

  /**
   * Refresh the package index, then upgrade installed packages. The upgrade
   * still runs when the refresh exits non-zero, but never after a timeout.
   */
  async runUpdate(): Promise<CommandResult> {
    if (this.updating) {
      logger.warn('Update requested while another update is running');
      return {
        success: false,
        outcome: 'rejected',
        error: 'An update is already in progress',
      };
    }

    this.updating = true;
    try {
      return await this.performUpdate();
    } finally {
      this.updating = false;
    }
  }

  async runReboot(): Promise<CommandResult> {
    try {
      await this.runner.launch(this.rebootCommand);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ err, command: this.rebootCommand.join(' ') }, 'Reboot failed to start');
      return { success: false, outcome: 'failed', error: message };
    }

    logger.warn('Reboot initiated');
    return { success: true, outcome: 'initiated', message: 'Reboot initiated' };
  }

  private async performUpdate(): Promise<CommandResult> {
    const steps: UpdateStep[] = [
      { name: 'update', argv: this.updateCommand, timeout: this.updateTimeout },
      { name: 'upgrade', argv: this.upgradeCommand, timeout: this.upgradeTimeout },
    ];
    const outputs: ProcessOutput[] = [];

    for (const step of steps) {
      logger.info({ step: step.name, command: step.argv.join(' ') }, 'Running update step');

      let output: ProcessOutput;
      try {
        output = await this.runner.run(step.argv, { timeout: step.timeout });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ err, step: step.name }, 'Update step failed to start');
        return { success: false, outcome: 'failed', error: message };
      }

      if (output.timedOut) {
        logger.error(
          { step: step.name, command: step.argv.join(' '), timeout: step.timeout },
          'Update step timed out',
        );
        return {
          success: false,
          outcome: 'timed-out',
          error: `Update operation timed out during ${step.name}`,
        };
      }

      if (output.exitCode !== 0) {
        logger.warn({ step: step.name, exitCode: output.exitCode }, 'Update step exited non-zero');
      }
      outputs.push(output);
    }

    const [refresh, upgrade] = outputs;
    const success = outputs.every((output) => output.exitCode === 0);
    const result: CommandResult = {
      success,
      outcome: success ? 'succeeded' : 'failed',
      update_output: refresh?.stdout ?? '',
      upgrade_output: upgrade?.stdout ?? '',
      errors: outputs.map((output) => output.stderr).join(''),
    };

    logger.info({ outcome: result.outcome }, 'Update finished');
    return result;
  }
}
