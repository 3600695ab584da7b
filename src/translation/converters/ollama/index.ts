/**
 * Ollama Converter - Main Orchestrator
 *
 * Single entry point for Ollama <-> upstream conversions. Delegates to the
 * request, response and stream converters.
 */

import { OllamaRequestConverter } from './OllamaRequestConverter.js';
import { OllamaResponseConverter } from './OllamaResponseConverter.js';
import { chatChunkBuilder, generateChunkBuilder } from './OllamaStreamConverter.js';

import type { ConvertedCompletionRequest, ConvertedEmbeddingRequest } from './OllamaRequestConverter.js';
import type { ChunkBuilder } from './OllamaStreamConverter.js';
import type {
  ChatCompletion,
  CreateEmbeddingResponse,
  OllamaChatChunk,
  OllamaChatResponse,
  OllamaEmbeddingsResponse,
  OllamaGenerateChunk,
  OllamaGenerateResponse,
} from '../../../types/index.js';

export class OllamaConverter {
  private readonly requestConverter = new OllamaRequestConverter();
  private readonly responseConverter = new OllamaResponseConverter();

  readonly generateChunks: ChunkBuilder<OllamaGenerateChunk> = generateChunkBuilder;
  readonly chatChunks: ChunkBuilder<OllamaChatChunk> = chatChunkBuilder;

  // Requests: Ollama → upstream
  generateRequest(body: unknown): ConvertedCompletionRequest {
    return this.requestConverter.fromGenerate(body);
  }

  chatRequest(body: unknown): ConvertedCompletionRequest {
    return this.requestConverter.fromChat(body);
  }

  embeddingsRequest(body: unknown): ConvertedEmbeddingRequest {
    return this.requestConverter.fromEmbeddings(body);
  }

  // Responses: upstream → Ollama
  generateResponse(completion: ChatCompletion, requestedModel: string): OllamaGenerateResponse {
    return this.responseConverter.toGenerateResponse(completion, requestedModel);
  }

  chatResponse(completion: ChatCompletion, requestedModel: string): OllamaChatResponse {
    return this.responseConverter.toChatResponse(completion, requestedModel);
  }

  embeddingsResponse(response: CreateEmbeddingResponse): OllamaEmbeddingsResponse {
    return this.responseConverter.toEmbeddingsResponse(response);
  }
}

// Export singleton instance
export const ollamaConverter = new OllamaConverter();

export type { ConvertedCompletionRequest, ConvertedEmbeddingRequest } from './OllamaRequestConverter.js';
export type { ChunkBuilder } from './OllamaStreamConverter.js';
export { PLACEHOLDER_CONTEXT, DEFAULT_DONE_REASON } from './OllamaHelpers.js';
