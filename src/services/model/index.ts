/**
 * Model Service
 *
 * Lists upstream models in the Ollama dialect. Every call goes upstream;
 * the HTTP layer advertises a cache lifetime instead of caching here.
 */

import { logger } from '../../logging/index.js';
import { modelConverter } from '../../translation/converters/modelConverter.js';

import type { OllamaTagsResponse } from '../../types/index.js';
import type { ModelService, UpstreamService } from '../contracts.js';

class ModelServiceImpl implements ModelService {
  constructor(private readonly upstream: UpstreamService) {}

  async listTags(): Promise<OllamaTagsResponse> {
    const models = await this.upstream.listModels();
    logger.debug(`[ModelService] Upstream returned ${models.length} models`);
    return modelConverter.toTagsResponse(models);
  }
}

export function createModelService(upstream: UpstreamService): ModelService {
  return new ModelServiceImpl(upstream);
}

export { ModelServiceImpl };
export { ModelRegistry, modelRegistry } from './ModelRegistry.js';
export type { ModelService };
