export class SentinelError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'SentinelError';
    this.code = code;
  }
}

/**
 * Errors that reach an HTTP client. The message is sent as-is, so it must
 * never carry internal detail.
 */
export class HttpError extends SentinelError {
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number) {
    super(message, code);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

export class UnauthorizedError extends HttpError {
  constructor() {
    // Same message for a missing header and a wrong password.
    super('Authentication required', 'UNAUTHORIZED', 401);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends HttpError {
  constructor(path: string) {
    super(`Route not found: ${path}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class MetricUnavailableError extends SentinelError {
  public readonly metric: string;

  constructor(metric: string, reason: string) {
    super(`Metric unavailable: ${metric} (${reason})`, 'METRIC_UNAVAILABLE');
    this.name = 'MetricUnavailableError';
    this.metric = metric;
  }
}

export class ConfigCorruptError extends SentinelError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Config file is corrupt: ${path} (${reason})`, 'CONFIG_CORRUPT');
    this.name = 'ConfigCorruptError';
    this.path = path;
  }
}

export class ConfigDirectoryError extends SentinelError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot create config directory ${path}: ${reason}`, 'CONFIG_DIRECTORY');
    this.name = 'ConfigDirectoryError';
    this.path = path;
  }
}

export class SettingsValidationError extends SentinelError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Settings validation failed:\n${errors.join('\n')}`, 'SETTINGS_VALIDATION_ERROR');
    this.name = 'SettingsValidationError';
    this.errors = errors;
  }
}

export class AgentRequestError extends SentinelError {
  public readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message, status === 401 ? 'AGENT_UNAUTHORIZED' : 'AGENT_REQUEST_FAILED');
    this.name = 'AgentRequestError';
    this.status = status;
  }
}
