import type { z } from 'zod';
import {
  AgentRequestError,
  DEFAULT_CLIENT_TIMEOUT,
  UPDATE_CLIENT_TIMEOUT,
  commandResultSchema,
  errorResponseSchema,
  formatDuration,
  healthResponseSchema,
  infoResponseSchema,
  metricsSnapshotSchema,
} from '@sentinel/shared';
import type {
  CommandResult,
  HealthResponse,
  InfoResponse,
  MetricsSnapshot,
} from '@sentinel/shared';
import { resolveConnection } from './connection.js';
import type { ConnectionOptions, GlobalFlags } from './connection.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

interface RequestOptions {
  method?: 'GET' | 'POST';
  auth?: boolean;
  timeout?: number;
  /** Statuses other than 2xx whose body is still a valid answer. */
  acceptStatuses?: number[];
}

/** HTTP client for one Sentinel agent. */
export class SentinelClient {
  private readonly baseUrl: string;
  private readonly password: string | undefined;
  private readonly fetchImpl: FetchFn;

  constructor(connection: ConnectionOptions, fetchImpl: FetchFn = fetch) {
    this.baseUrl = `http://${connection.host}:${connection.port}`;
    this.password = connection.password;
    this.fetchImpl = fetchImpl;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  health(): Promise<HealthResponse> {
    return this.request('/health', healthResponseSchema);
  }

  info(): Promise<InfoResponse> {
    return this.request('/info', infoResponseSchema);
  }

  metrics(): Promise<MetricsSnapshot> {
    return this.request('/metrics', metricsSnapshotSchema, { auth: true });
  }

  update(): Promise<CommandResult> {
    return this.request('/update', commandResultSchema, {
      method: 'POST',
      auth: true,
      timeout: UPDATE_CLIENT_TIMEOUT,
      acceptStatuses: [409, 500],
    });
  }

  reboot(): Promise<CommandResult> {
    return this.request('/reboot', commandResultSchema, {
      method: 'POST',
      auth: true,
      acceptStatuses: [500],
    });
  }

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const {
      method = 'GET',
      auth = false,
      timeout = DEFAULT_CLIENT_TIMEOUT,
      acceptStatuses = [],
    } = options;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (auth) {
      if (!this.password) {
        throw new AgentRequestError(
          'A password is required for this command (--password or SENTINEL_PASSWORD)',
        );
      }
      headers.Authorization = `Bearer ${this.password}`;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new AgentRequestError(`Request to ${path} timed out after ${formatDuration(timeout)}`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new AgentRequestError(`Cannot reach agent at ${this.baseUrl}: ${reason}`);
    } finally {
      clearTimeout(timer);
    }

    const body = await readJson(response);

    if (!response.ok && !acceptStatuses.includes(response.status)) {
      if (response.status === 401) {
        throw new AgentRequestError('Authentication failed: check the password', 401);
      }
      const error = errorResponseSchema.safeParse(body);
      const detail = error.success ? error.data.message : response.statusText;
      throw new AgentRequestError(`Agent returned ${response.status}: ${detail}`, response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new AgentRequestError(`Unexpected response from ${path}`, response.status);
    }
    return parsed.data;
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Build a client from the global --host, --port and --password flags. */
export function createClient(flags: GlobalFlags): SentinelClient {
  return new SentinelClient(resolveConnection(flags));
}
