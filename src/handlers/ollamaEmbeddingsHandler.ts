/**
 * Ollama /api/embeddings and /api/embed Handler
 *
 * Both routes answer with a single `{ embedding }` vector.
 */

import { requestedModel, sendHTTPError, sendSuccessJSON } from '../utils/http/index.js';

import type { CompletionService } from '../services/index.js';
import type { Request, RequestHandler, Response } from 'express';

const CONTEXT = 'OLLAMA EMBEDDINGS';

export function createOllamaEmbeddingsHandler(completions: CompletionService): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const response = await completions.embed(req.body);
      sendSuccessJSON(res, response);
    } catch (error: unknown) {
      sendHTTPError(res, error, CONTEXT, requestedModel(req));
    }
  };
}
