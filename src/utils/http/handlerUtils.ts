/**
 * Handler Utilities - SSOT for shared request handler functionality
 *
 * Centralizes common logic used across handlers:
 * - Correlation id access
 * - Debug logging
 * - Success response sending
 */

import { logger } from '../../logging/index.js';
import { configService } from '../../services/configService.js';
import { isRecord } from '../../translation/utils/typeGuards.js';
import { generateCorrelationId } from '../correlation.js';

import type { Request, Response } from 'express';

const CORRELATION_LOCAL = 'correlationId';

export function setCorrelationId(res: Response, correlationId: string): void {
  res.locals[CORRELATION_LOCAL] = correlationId;
}

/**
 * Correlation id assigned by the correlation middleware; minted here if the
 * middleware did not run (handlers mounted on their own in tests)
 */
export function getCorrelationId(res: Response): string {
  const existing: unknown = res.locals[CORRELATION_LOCAL];
  if (typeof existing === 'string') {
    return existing;
  }
  const correlationId = generateCorrelationId();
  setCorrelationId(res, correlationId);
  return correlationId;
}

/**
 * Model named in the request body, if any; used to word error messages
 */
export function requestedModel(req: Request): string | undefined {
  const body: unknown = req.body;
  if (isRecord(body) && typeof body['model'] === 'string' && body['model'] !== '') {
    return body['model'];
  }
  return undefined;
}

export function wantsStream(req: Request): boolean {
  const body: unknown = req.body;
  return isRecord(body) && body['stream'] === true;
}

/**
 * Log response payload if debug mode is enabled
 */
export function logDebugResponse(context: string, response: unknown): void {
  if (configService.isDebugMode()) {
    logger.debug(`[${context}] Response payload:`, JSON.stringify(response, null, 2));
  }
}

/**
 * Send JSON success response with optional debug logging
 */
export function sendSuccessJSON(
  res: Response,
  data: unknown,
  debugContext?: string
): void {
  if (debugContext) {
    logDebugResponse(debugContext, data);
  }
  res.status(200).json(data);
}
