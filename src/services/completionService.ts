/**
 * Completion Service Implementation
 *
 * SSOT for generate, chat and embedding flows: validate and convert the
 * Ollama request, call the upstream, convert the result back.
 */

import { ollamaConverter } from '../translation/converters/ollama/index.js';
import { StreamRelay } from '../translation/stream/StreamRelay.js';
import { logger } from '../logging/index.js';

import type { CompletionService, UpstreamService } from './contracts.js';
import type {
  OllamaChatChunk,
  OllamaChatResponse,
  OllamaEmbeddingsResponse,
  OllamaGenerateChunk,
  OllamaGenerateResponse,
} from '../types/index.js';

class CompletionServiceImpl implements CompletionService {
  constructor(private readonly upstream: UpstreamService) {}

  async generate(body: unknown): Promise<OllamaGenerateResponse> {
    const { requestedModel, params } = ollamaConverter.generateRequest(body);
    logger.debug(`[GENERATE] model=${requestedModel} upstream=${params.model}`);

    const completion = await this.upstream.createCompletion(params);
    return ollamaConverter.generateResponse(completion, requestedModel);
  }

  async chat(body: unknown): Promise<OllamaChatResponse> {
    const { requestedModel, params } = ollamaConverter.chatRequest(body);
    logger.debug(`[CHAT] model=${requestedModel} upstream=${params.model} messages=${params.messages.length}`);

    const completion = await this.upstream.createCompletion(params);
    return ollamaConverter.chatResponse(completion, requestedModel);
  }

  /**
   * Validation errors throw here, before anything is streamed; upstream
   * failures surface later as the relay's terminal record.
   */
  streamGenerate(body: unknown, correlationId: string): StreamRelay<OllamaGenerateChunk> {
    const { requestedModel, params } = ollamaConverter.generateRequest(body);
    return new StreamRelay(
      (signal) => this.upstream.createCompletionStream(params, signal),
      ollamaConverter.generateChunks,
      requestedModel,
      correlationId,
    );
  }

  streamChat(body: unknown, correlationId: string): StreamRelay<OllamaChatChunk> {
    const { requestedModel, params } = ollamaConverter.chatRequest(body);
    return new StreamRelay(
      (signal) => this.upstream.createCompletionStream(params, signal),
      ollamaConverter.chatChunks,
      requestedModel,
      correlationId,
    );
  }

  async embed(body: unknown): Promise<OllamaEmbeddingsResponse> {
    const { requestedModel, params } = ollamaConverter.embeddingsRequest(body);
    logger.debug(`[EMBEDDINGS] model=${requestedModel} upstream=${params.model}`);

    const response = await this.upstream.createEmbedding(params);
    return ollamaConverter.embeddingsResponse(response);
  }
}

export function createCompletionService(upstream: UpstreamService): CompletionService {
  return new CompletionServiceImpl(upstream);
}

export { CompletionServiceImpl };
