/**
 * Model Format Converter
 *
 * SSOT for turning the upstream model list into an Ollama /api/tags response.
 */

import { logger as defaultLogger, type Logger } from '../../logging/index.js';
import { modelRegistry, type ModelRegistry } from '../../services/model/ModelRegistry.js';

import type { OllamaModel, OllamaTagsResponse, UpstreamModel } from '../../types/index.js';

export interface ModelListingStats {
  included: number;
  excluded: number;
  failed: number;
}

class ModelConverterImpl {
  constructor(
    private readonly registry: ModelRegistry = modelRegistry,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Filter, describe and sort (by name, ascending) the upstream models.
   * A model whose description fails is logged and skipped; the rest are still listed.
   */
  translateModels(models: readonly UpstreamModel[]): { tags: OllamaTagsResponse; stats: ModelListingStats } {
    const stats: ModelListingStats = { included: 0, excluded: 0, failed: 0 };
    const described: OllamaModel[] = [];

    for (const model of models) {
      if (!this.registry.shouldInclude(model.id)) {
        stats.excluded += 1;
        continue;
      }

      try {
        described.push(this.registry.toDescriptor(model.id, model.created));
        stats.included += 1;
      } catch (error: unknown) {
        stats.failed += 1;
        this.logger.warn(`[MODELS] Skipping model ${model.id}:`, error instanceof Error ? error.message : String(error));
      }
    }

    described.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    this.logger.info(
      `[MODELS] Translated ${models.length} upstream models: ${stats.included} included, ${stats.excluded} excluded, ${stats.failed} failed`,
    );

    return { tags: { models: described }, stats };
  }

  toTagsResponse(models: readonly UpstreamModel[]): OllamaTagsResponse {
    return this.translateModels(models).tags;
  }
}

export const modelConverter = new ModelConverterImpl();

export { ModelConverterImpl };
