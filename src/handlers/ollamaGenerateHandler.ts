/**
 * Ollama /api/generate Handler
 *
 * Unary requests return one JSON body; `stream: true` returns NDJSON records
 * relayed from the upstream stream. Validation failures are reported before
 * any streaming starts.
 */

import { logger } from "../logging/index.js";
import {
  getCorrelationId,
  pipeRelayToResponse,
  requestedModel,
  sendHTTPError,
  sendSuccessJSON,
  setNdjsonHeaders,
  wantsStream,
} from "../utils/http/index.js";

import type { CompletionService } from "../services/index.js";
import type { Request, RequestHandler, Response } from "express";

const CONTEXT = "OLLAMA GENERATE";

export function createOllamaGenerateHandler(completions: CompletionService): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const correlationId = getCorrelationId(res);
    logger.debug(`[${CONTEXT}] Body:`, JSON.stringify(body, null, 2));

    try {
      if (wantsStream(req)) {
        const relay = completions.streamGenerate(body, correlationId);
        setNdjsonHeaders(res, correlationId);
        await pipeRelayToResponse(relay, res, CONTEXT);
        return;
      }

      const response = await completions.generate(body);
      sendSuccessJSON(res, response, CONTEXT);
    } catch (error: unknown) {
      sendHTTPError(res, error, CONTEXT, requestedModel(req));
    }
  };
}
