/**
 * Express application factory
 *
 * Wires handlers to routes. Services are passed in so the same app runs
 * against the real upstream or an in-process fake.
 */

import express, { type NextFunction, type Request, type Response } from "express";

import { HEALTH_ENDPOINTS, OLLAMA_ENDPOINTS } from "../constants/endpoints.js";
import { createHealthHandlers } from "../handlers/healthHandler.js";
import { createOllamaChatHandler } from "../handlers/ollamaChatHandler.js";
import { createOllamaEmbeddingsHandler } from "../handlers/ollamaEmbeddingsHandler.js";
import { createOllamaGenerateHandler } from "../handlers/ollamaGenerateHandler.js";
import { createOllamaTagsHandler } from "../handlers/ollamaTagsHandler.js";
import { createOllamaVersionHandler } from "../handlers/ollamaVersionHandler.js";
import { logger } from "../logging/index.js";
import { createCompletionService, createModelService, HealthService, RequestMetrics } from "../services/index.js";
import { RequestValidationError } from "../translation/errors/index.js";
import { isRecord } from "../translation/utils/typeGuards.js";
import { createRequestContextMiddleware, sendHTTPError } from "../utils/http/index.js";

import type { UpstreamService } from "../services/index.js";
import type { ConfigSummary } from "../types/index.js";
import type { Express } from "express";

const JSON_BODY_LIMIT = "50mb";

export interface AppDependencies {
  upstream: UpstreamService;
  ollamaVersion: string;
  config: ConfigSummary;
  metrics?: RequestMetrics;
  startedAt?: Date;
}

export interface ShimApp {
  app: Express;
  metrics: RequestMetrics;
  health: HealthService;
}

function isBodyParseError(error: unknown): boolean {
  return isRecord(error) && error["type"] === "entity.parse.failed";
}

export function createApp(deps: AppDependencies): ShimApp {
  const metrics = deps.metrics ?? new RequestMetrics();
  const health = new HealthService({
    upstream: deps.upstream,
    metrics,
    version: deps.ollamaVersion,
    config: deps.config,
    startedAt: deps.startedAt,
  });
  const completions = createCompletionService(deps.upstream);
  const models = createModelService(deps.upstream);
  const probes = createHealthHandlers(health);

  const app = express();
  app.disable("x-powered-by");
  app.use(createRequestContextMiddleware(metrics));

  // ============================================================================
  // PROBES
  // ============================================================================

  app.get(HEALTH_ENDPOINTS.ROOT, probes.root);
  app.get(HEALTH_ENDPOINTS.HEALTH, probes.health);
  app.get(HEALTH_ENDPOINTS.READY, probes.ready);
  app.get(HEALTH_ENDPOINTS.LIVE, probes.live);
  app.get(HEALTH_ENDPOINTS.METRICS, probes.metrics);
  app.get(HEALTH_ENDPOINTS.UPSTREAM_HEALTH, probes.upstream);
  app.get(HEALTH_ENDPOINTS.CONFIG_VALIDATE, probes.config);

  // ============================================================================
  // OLLAMA API ENDPOINTS (translated to the upstream API)
  // ============================================================================

  const jsonBody = express.json({ limit: JSON_BODY_LIMIT });
  const embeddings = createOllamaEmbeddingsHandler(completions);

  app.get(OLLAMA_ENDPOINTS.TAGS, createOllamaTagsHandler(models));
  app.get(OLLAMA_ENDPOINTS.VERSION, createOllamaVersionHandler(deps.ollamaVersion));
  app.post(OLLAMA_ENDPOINTS.GENERATE, jsonBody, createOllamaGenerateHandler(completions));
  app.post(OLLAMA_ENDPOINTS.CHAT, jsonBody, createOllamaChatHandler(completions));
  app.post(OLLAMA_ENDPOINTS.EMBEDDINGS, jsonBody, embeddings);
  app.post(OLLAMA_ENDPOINTS.EMBED, jsonBody, embeddings);

  // 404 handler - Express 5 compatible
  app.use((req: Request, res: Response) => {
    logger.warn("[SERVER] 404 Not Found:", req.originalUrl);
    res.status(404).json({ error: `Endpoint not found: ${req.method} ${req.path}` });
  });

  // Malformed JSON bodies arrive here from express.json()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const cause = isBodyParseError(error)
      ? new RequestValidationError("Request body must be valid JSON")
      : error;
    sendHTTPError(res, cause, "SERVER");
  });

  return { app, metrics, health };
}
