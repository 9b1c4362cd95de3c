export interface HealthResponse {
  status: 'healthy';
  service: string;
  timestamp: string;
}

export interface InfoResponse {
  service: string;
  version: string;
  endpoints: string[];
  authentication: string;
}

export interface ErrorResponse {
  code: string;
  message: string;
}

export type AuthOutcome = 'ok' | 'unauthenticated' | 'invalid';
