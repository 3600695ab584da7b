/**
 * Service Layer Contracts
 *
 * Defines the interfaces between HTTP handlers and business logic.
 * Handlers depend on these interfaces; tests substitute fakes behind them.
 */

import type { ChunkStream } from './upstream/chunkStream.js';
import type { StreamRelay } from '../translation/stream/StreamRelay.js';
import type {
  ChatCompletion,
  ChatCompletionChunk,
  CompletionParams,
  ConfigSummary,
  CreateEmbeddingResponse,
  EmbeddingCreateParams,
  OllamaChatChunk,
  OllamaChatResponse,
  OllamaGenerateChunk,
  OllamaGenerateResponse,
  OllamaEmbeddingsResponse,
  OllamaTagsResponse,
  RetryPolicy,
  UpstreamHealth,
  UpstreamModel,
  UpstreamSettings,
} from '../types/index.js';

/**
 * Upstream client adapter - the only component that talks to the OpenAI-compatible API
 */
export interface UpstreamService {
  listModels(): Promise<UpstreamModel[]>;

  createCompletion(params: CompletionParams): Promise<ChatCompletion>;

  /**
   * Retries cover opening the stream only; once chunks flow, failures surface
   * from `next()` and are never retried. Aborting `signal` stops the retries
   * and the request in flight.
   */
  createCompletionStream(params: CompletionParams, signal?: AbortSignal): Promise<ChunkStream<ChatCompletionChunk>>;

  createEmbedding(params: EmbeddingCreateParams): Promise<CreateEmbeddingResponse>;

  /** Never throws; failures are reported as `unhealthy` */
  healthCheck(): Promise<UpstreamHealth>;

  /** Release pooled connections; the next call reconnects */
  close(): Promise<void>;
}

/**
 * Model listing in the Ollama dialect
 */
export interface ModelService {
  listTags(): Promise<OllamaTagsResponse>;
}

/**
 * Completion and embedding operations in the Ollama dialect.
 * Request bodies are validated here, so they arrive as `unknown`.
 */
export interface CompletionService {
  generate(body: unknown): Promise<OllamaGenerateResponse>;
  chat(body: unknown): Promise<OllamaChatResponse>;
  streamGenerate(body: unknown, correlationId: string): StreamRelay<OllamaGenerateChunk>;
  streamChat(body: unknown, correlationId: string): StreamRelay<OllamaChatChunk>;
  embed(body: unknown): Promise<OllamaEmbeddingsResponse>;
}

/**
 * Configuration service - single source for all config
 */
export interface ConfigService {
  getUpstreamSettings(): UpstreamSettings;
  getRetryPolicy(): RetryPolicy;
  getProxyPort(): number;
  getProxyHost(): string;
  getOllamaVersion(): string;
  isDebugMode(): boolean;
  getConfigSummary(): ConfigSummary;
}
