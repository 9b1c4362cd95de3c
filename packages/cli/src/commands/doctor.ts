import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_SENTINEL_HOME, SENTINEL_SERVICE_ID } from '@sentinel/shared';
import type { GlobalFlags } from '../utils/connection.js';
import { runDiagnostics } from '../utils/diagnostics.js';
import type { CheckResult, DiagnosticsReport } from '../utils/diagnostics.js';
import { UNIT_PATH } from '../utils/systemd.js';

interface DoctorOptions {
  home?: string;
}

export function formatCheck(check: CheckResult): string {
  switch (check.status) {
    case 'ok':
      return chalk.green(`  ✓ ${check.label}`);
    case 'warn':
      return chalk.yellow(`  ⚠ ${check.label}`);
    case 'error':
      return chalk.red(`  ✗ ${check.label}`);
  }
}

export function renderDoctorReport(report: DiagnosticsReport, host: string): string {
  const lines = report.checks.map(formatCheck);
  lines.push('');

  if (report.issues > 0) {
    lines.push(chalk.red(`  Found ${report.issues} issue(s) to fix.`));
  } else {
    lines.push(chalk.green('  No issues found! The agent is installed and running.'));
  }

  if (report.port !== null) {
    lines.push('', chalk.bold('  Connection'));
    lines.push(`  Health:   curl http://${host}:${report.port}/health`);
    lines.push(`  Metrics:  sentinel --host ${host} --port ${report.port} --password <password> metrics`);
  }

  lines.push('', chalk.bold('  Useful commands'));
  lines.push(`  Service status: systemctl status ${SENTINEL_SERVICE_ID}`);
  lines.push(`  Service logs:   journalctl -u ${SENTINEL_SERVICE_ID} -f`);
  lines.push('');
  return lines.join('\n');
}

export const doctorCommand = new Command('doctor')
  .description('Diagnose the local agent installation')
  .option('--home <dir>', 'Agent configuration directory (env SENTINEL_HOME)')
  .action(async (options: DoctorOptions, command: Command) => {
    const flags = command.optsWithGlobals<GlobalFlags>();
    const host = flags.host ?? '127.0.0.1';
    const home = options.home ?? (process.env.SENTINEL_HOME || DEFAULT_SENTINEL_HOME);

    console.log(chalk.bold('\n  Sentinel Doctor\n'));

    const report = await runDiagnostics({ home, unitPath: UNIT_PATH, host });
    console.log(renderDoctorReport(report, host));

    if (report.issues > 0) {
      process.exitCode = 1;
    }
  });
