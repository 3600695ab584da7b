/**
 * Shim Core Types
 */

/**
 * Closed set of error kinds exposed to clients. Anything the upstream reports
 * that has no dedicated kind is folded into `internal`.
 */
export type ErrorKind =
  | 'rate_limit'
  | 'auth'
  | 'not_found'
  | 'bad_request'
  | 'connection'
  | 'timeout'
  | 'internal'
  | 'validation';

export interface ErrorEnvelope {
  message: string;
  kind: ErrorKind;
  /** Wire-level error type, e.g. `rate_limit_error` or `api_error_418` */
  type: string;
  httpStatus: number;
  correlationId: string;
  retryAfterSeconds?: number;
  model?: string;
}

export interface CounterSnapshot {
  requestCount: number;
  errorCount: number;
  errorRate: number;
}

export type UpstreamHealth =
  | ({ status: 'healthy'; modelsAvailable: number } & CounterSnapshot)
  | ({ status: 'unhealthy'; error: string } & CounterSnapshot);

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
}

/**
 * Settings reported by /config/validate. Never carries the API key itself.
 */
export interface ConfigSummary {
  upstream_base_url: string;
  proxy_host: string;
  proxy_port: number;
  debug_mode: boolean;
  request_timeout_seconds: number;
  max_retries: number;
  api_key_configured: boolean;
}

export interface UpstreamSettings {
  baseUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  maxConnections: number;
  keepAliveTimeoutMs: number;
}
