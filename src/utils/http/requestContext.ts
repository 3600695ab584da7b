/**
 * Per-request middleware: correlation id, request/response log lines and
 * request metrics.
 */

import { SHIM_HEADERS } from "../../constants/endpoints.js";
import { logRequest, logResponse } from "../../logging/index.js";
import { resolveCorrelationId } from "../correlation.js";

import { setCorrelationId } from "./handlerUtils.js";

import type { RequestMetrics } from "../../services/metrics.js";
import type { NextFunction, Request, RequestHandler, Response } from "express";

export function createRequestContextMiddleware(metrics: RequestMetrics): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startedAt = Date.now();
    const correlationId = resolveCorrelationId(req.headers);
    const routeName = `${req.method} ${req.path}`;

    setCorrelationId(res, correlationId);
    res.setHeader(SHIM_HEADERS.CORRELATION_ID, correlationId);
    logRequest(req, routeName, correlationId);

    res.on("finish", () => {
      metrics.record(res.statusCode);
      logResponse(res.statusCode, routeName, Date.now() - startedAt);
    });

    next();
  };
}
