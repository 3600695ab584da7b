/**
 * Error Response Handler - SSOT for HTTP Error Handling
 *
 * Handlers pass whatever they caught to sendHTTPError(); the error translator
 * picks the status and message, this module only writes the response.
 */

import { logger } from "../../logging/index.js";
import { toSimpleError, translateError } from "../../translation/errors/errorTranslator.js";

import { getCorrelationId } from "./handlerUtils.js";

import type { ErrorEnvelope } from "../../types/index.js";
import type { Response } from "express";

/**
 * Sends an HTTP error response (for unary handlers and streams that have not started)
 *
 * @param context - Error context for logging (e.g., "OLLAMA TAGS")
 * @param model - Requested model, named in not-found messages
 */
export function sendHTTPError(res: Response, error: unknown, context: string, model?: string): ErrorEnvelope {
  const envelope = translateError(error, model, getCorrelationId(res));
  sendErrorEnvelope(res, envelope, context);
  return envelope;
}

export function sendErrorEnvelope(res: Response, envelope: ErrorEnvelope, context: string): void {
  if (res.headersSent) {
    logger.error(`[${context}] Headers already sent, cannot report ${envelope.type}`);
    if (!res.writableEnded) {
      res.end();
    }
    return;
  }

  if (envelope.retryAfterSeconds !== undefined) {
    res.setHeader("Retry-After", String(envelope.retryAfterSeconds));
  }
  res.status(envelope.httpStatus).json(toSimpleError(envelope));
}
