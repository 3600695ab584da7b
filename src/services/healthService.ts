/**
 * Health Service
 *
 * Builds the payloads for the liveness, readiness, health and metrics probes,
 * the raw upstream check and the configuration summary.
 */

import type { UpstreamService } from './contracts.js';
import type { RequestMetrics, RequestMetricsSnapshot } from './metrics.js';
import type { ConfigSummary, UpstreamHealth } from '../types/index.js';

export const APP_NAME = 'ollama-openai-shim';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  version: string;
  timestamp: string;
  uptime_seconds: number;
  upstream: {
    status: UpstreamHealth['status'];
    models_available: number;
    request_count: number;
    error_count: number;
    error_rate: number;
    error?: string;
  };
}

export type ReadinessReport =
  | { status: 'ready'; version: string; timestamp: string; uptime_seconds: number }
  | { status: 'not_ready'; reason: string; details: UpstreamHealth; timestamp: string };

export interface LivenessReport {
  status: 'alive';
  timestamp: string;
  uptime_seconds: number;
}

export interface MetricsReport {
  app_info: { name: string; version: string };
  uptime_seconds: number;
  requests: RequestMetricsSnapshot;
  timestamp: string;
}

export interface ConfigReport {
  status: 'valid';
  config: ConfigSummary;
}

export interface HealthServiceOptions {
  upstream: UpstreamService;
  metrics: RequestMetrics;
  version: string;
  config: ConfigSummary;
  startedAt?: Date;
  now?: () => Date;
}

export class HealthService {
  private readonly upstream: UpstreamService;
  private readonly metrics: RequestMetrics;
  private readonly version: string;
  private readonly config: ConfigSummary;
  private readonly startedAt: Date;
  private readonly now: () => Date;

  constructor(options: HealthServiceOptions) {
    this.upstream = options.upstream;
    this.metrics = options.metrics;
    this.version = options.version;
    this.config = options.config;
    this.now = options.now ?? (() => new Date());
    this.startedAt = options.startedAt ?? this.now();
  }

  uptimeSeconds(): number {
    return Math.max(0, Math.floor((this.now().getTime() - this.startedAt.getTime()) / 1000));
  }

  /**
   * Upstream trouble degrades the report but the process itself is healthy
   */
  async health(): Promise<HealthReport> {
    const upstream = await this.upstream.healthCheck();

    const report: HealthReport = {
      status: upstream.status === 'healthy' ? 'healthy' : 'degraded',
      version: this.version,
      timestamp: this.now().toISOString(),
      uptime_seconds: this.uptimeSeconds(),
      upstream: {
        status: upstream.status,
        models_available: upstream.status === 'healthy' ? upstream.modelsAvailable : 0,
        request_count: upstream.requestCount,
        error_count: upstream.errorCount,
        error_rate: upstream.errorRate,
      },
    };
    if (upstream.status === 'unhealthy') {
      report.upstream.error = upstream.error;
    }
    return report;
  }

  async readiness(): Promise<ReadinessReport> {
    const upstream = await this.upstream.healthCheck();
    const timestamp = this.now().toISOString();

    if (upstream.status !== 'healthy') {
      return { status: 'not_ready', reason: 'Upstream API not healthy', details: upstream, timestamp };
    }
    return { status: 'ready', version: this.version, timestamp, uptime_seconds: this.uptimeSeconds() };
  }

  upstreamHealth(): Promise<UpstreamHealth> {
    return this.upstream.healthCheck();
  }

  configReport(): ConfigReport {
    return { status: 'valid', config: { ...this.config } };
  }

  liveness(): LivenessReport {
    return { status: 'alive', timestamp: this.now().toISOString(), uptime_seconds: this.uptimeSeconds() };
  }

  metricsReport(): MetricsReport {
    return {
      app_info: { name: APP_NAME, version: this.version },
      uptime_seconds: this.uptimeSeconds(),
      requests: this.metrics.snapshot(),
      timestamp: this.now().toISOString(),
    };
  }
}
