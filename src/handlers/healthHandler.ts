/**
 * Probe Handlers (/, /health, /ready, /live, /metrics, /openai/health, /config/validate)
 */

import { logger } from '../logging/index.js';

import type { HealthService } from '../services/index.js';
import type { Request, RequestHandler, Response } from 'express';

export interface HealthHandlers {
  root: RequestHandler;
  health: RequestHandler;
  ready: RequestHandler;
  live: RequestHandler;
  metrics: RequestHandler;
  upstream: RequestHandler;
  config: RequestHandler;
}

export function createHealthHandlers(health: HealthService): HealthHandlers {
  return {
    root: (_req: Request, res: Response): void => {
      res.json({ status: 'OK', message: 'Ollama API shim is running.' });
    },

    // Degraded upstream still answers 200: the shim itself is up
    health: async (_req: Request, res: Response): Promise<void> => {
      const report = await health.health();
      if (report.status === 'degraded') {
        logger.warn(`[HEALTH] Upstream unhealthy: ${report.upstream.error ?? 'unknown error'}`);
      }
      res.status(200).json(report);
    },

    ready: async (_req: Request, res: Response): Promise<void> => {
      const report = await health.readiness();
      res.status(report.status === 'ready' ? 200 : 503).json(report);
    },

    live: (_req: Request, res: Response): void => {
      res.status(200).json(health.liveness());
    },

    metrics: (_req: Request, res: Response): void => {
      res.status(200).json(health.metricsReport());
    },

    upstream: async (_req: Request, res: Response): Promise<void> => {
      const report = await health.upstreamHealth();
      res.status(report.status === 'healthy' ? 200 : 503).json(report);
    },

    config: (_req: Request, res: Response): void => {
      res.status(200).json(health.configReport());
    },
  };
}
