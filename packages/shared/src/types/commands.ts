export type CommandOutcome = 'succeeded' | 'failed' | 'timed-out' | 'initiated' | 'rejected';

/**
 * Result of a privileged command. `timed-out` leaves the host in an unknown
 * state: the step may or may not have applied its changes.
 */
export interface CommandResult {
  success: boolean;
  outcome: CommandOutcome;
  message?: string;
  update_output?: string;
  upgrade_output?: string;
  errors?: string;
  error?: string;
}

export interface ProcessOutput {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}
