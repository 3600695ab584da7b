/**
 * Ollama /api/chat Handler
 *
 * Same flow as /api/generate, but over a message list; responses carry an
 * assistant `message` instead of `response` and `context`.
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

const CONTEXT = "OLLAMA CHAT";

export function createOllamaChatHandler(completions: CompletionService): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const correlationId = getCorrelationId(res);
    logger.debug(`[${CONTEXT}] Body:`, JSON.stringify(body, null, 2));

    try {
      if (wantsStream(req)) {
        const relay = completions.streamChat(body, correlationId);
        setNdjsonHeaders(res, correlationId);
        await pipeRelayToResponse(relay, res, CONTEXT);
        return;
      }

      const response = await completions.chat(body);
      sendSuccessJSON(res, response, CONTEXT);
    } catch (error: unknown) {
      sendHTTPError(res, error, CONTEXT, requestedModel(req));
    }
  };
}
