import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { sentinelConfigSchema } from '@sentinel/shared';
import { SentinelClient } from './client.js';
import type { ConnectionOptions } from './connection.js';

export type CheckStatus = 'ok' | 'warn' | 'error';

export interface CheckResult {
  status: CheckStatus;
  label: string;
}

export interface DiagnosticsOptions {
  home: string;
  unitPath: string;
  /** Address used to reach the local agent. */
  host: string;
}

type EndpointClient = Pick<SentinelClient, 'health' | 'info' | 'getBaseUrl'>;

export interface DiagnosticsDeps {
  nodeVersion?: string;
  createClient?: (connection: ConnectionOptions) => EndpointClient;
}

export interface DiagnosticsReport {
  checks: CheckResult[];
  /** Port from a valid config file, when there is one. */
  port: number | null;
  issues: number;
}

const REQUIRED_NODE_MAJOR = 20;
const CONFIG_FILE_MODE = 0o600;

/**
 * Check a local agent installation: runtime, service unit, config directory and
 * file, and the public endpoints of the running agent.
 */
export async function runDiagnostics(
  options: DiagnosticsOptions,
  deps: DiagnosticsDeps = {},
): Promise<DiagnosticsReport> {
  const nodeVersion = deps.nodeVersion ?? process.versions.node;
  const createClient: (connection: ConnectionOptions) => EndpointClient =
    deps.createClient ?? ((connection) => new SentinelClient(connection));
  const checks: CheckResult[] = [];

  const major = Number.parseInt(nodeVersion.split('.')[0] ?? '', 10);
  checks.push(
    major >= REQUIRED_NODE_MAJOR
      ? { status: 'ok', label: `Node.js version: ${nodeVersion}` }
      : { status: 'error', label: `Node.js version: ${nodeVersion} (requires >= ${REQUIRED_NODE_MAJOR})` },
  );

  checks.push(
    (await exists(options.unitPath))
      ? { status: 'ok', label: `Service unit: ${options.unitPath}` }
      : { status: 'warn', label: `Service unit not installed: ${options.unitPath}` },
  );

  if (!(await exists(options.home))) {
    checks.push({ status: 'error', label: `Config directory not found: ${options.home}` });
    return report(checks, null);
  }
  checks.push({ status: 'ok', label: `Config directory: ${options.home}` });

  const port = await checkConfigFile(join(options.home, 'config.json'), checks);
  if (port === null) {
    return report(checks, null);
  }

  const client = createClient({ host: options.host, port });
  const endpoints: Array<[string, () => Promise<unknown>]> = [
    ['/health', () => client.health()],
    ['/info', () => client.info()],
  ];
  for (const [path, call] of endpoints) {
    try {
      await call();
      checks.push({ status: 'ok', label: `${path} reachable at ${client.getBaseUrl()}` });
    } catch (err) {
      checks.push({ status: 'error', label: `${path} unreachable: ${describe(err)}` });
    }
  }

  return report(checks, port);
}

async function checkConfigFile(path: string, checks: CheckResult[]): Promise<number | null> {
  let mode: number;
  try {
    mode = (await stat(path)).mode & 0o777;
  } catch (err) {
    checks.push(
      isMissing(err)
        ? { status: 'error', label: `Config file not found: ${path}` }
        : { status: 'error', label: `Config file unreadable: ${describe(err)}` },
    );
    return null;
  }

  checks.push(
    mode === CONFIG_FILE_MODE
      ? { status: 'ok', label: 'Config file permissions: 600' }
      : { status: 'warn', label: `Config file permissions: ${mode.toString(8)} (expected 600)` },
  );

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    checks.push({ status: 'error', label: `Config file unreadable: ${describe(err)}` });
    return null;
  }

  const result = sentinelConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    checks.push({ status: 'error', label: `Config file invalid: ${issues.join('; ')}` });
    return null;
  }

  checks.push({ status: 'ok', label: `Config file valid (port ${result.data.port})` });
  return result.data.port;
}

function report(checks: CheckResult[], port: number | null): DiagnosticsReport {
  return {
    checks,
    port,
    issues: checks.filter((check) => check.status === 'error').length,
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
