/**
 * Ollama /api/version Handler
 *
 * Returns a synthetic version; some clients refuse to talk to a server
 * that does not answer this endpoint.
 */

import { logger } from '../logging/index.js';

import type { OllamaVersionResponse } from '../types/index.js';
import type { Request, RequestHandler, Response } from 'express';

export function createOllamaVersionHandler(version: string): RequestHandler {
  return (_req: Request, res: Response): void => {
    logger.debug(`[OLLAMA VERSION] Returning synthetic version ${version}`);

    const body: OllamaVersionResponse = { version };
    res.status(200).json(body);
  };
}
