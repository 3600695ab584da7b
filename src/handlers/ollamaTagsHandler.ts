/**
 * Ollama /api/tags Handler
 *
 * Lists upstream models translated into Ollama model descriptors.
 */

import { SHIM_HEADERS } from '../constants/endpoints.js';
import { logger } from '../logging/index.js';
import { sendHTTPError, sendSuccessJSON } from '../utils/http/index.js';

import type { ModelService } from '../services/index.js';
import type { Request, RequestHandler, Response } from 'express';

const CONTEXT = 'OLLAMA TAGS';
const TAGS_CACHE_CONTROL = 'public, max-age=300';

export function createOllamaTagsHandler(models: ModelService): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      logger.debug(`[${CONTEXT}] Request received from ${req.ip ?? 'unknown'}`);

      const response = await models.listTags();
      logger.debug(`[${CONTEXT}] Returning ${response.models.length} models`);

      res.setHeader('Cache-Control', TAGS_CACHE_CONTROL);
      res.setHeader(SHIM_HEADERS.MODEL_COUNT, String(response.models.length));
      sendSuccessJSON(res, response, CONTEXT);
    } catch (error: unknown) {
      sendHTTPError(res, error, CONTEXT);
    }
  };
}
