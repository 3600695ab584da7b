/**
 * Upstream Service Implementation
 *
 * SSOT for all communication with the OpenAI-compatible API.
 * One pooled client per process, created on first use and torn down by close().
 */

import OpenAI from 'openai';
import { Agent } from 'undici';

import { logger } from '../logging/index.js';

import { RequestCounters } from './requestCounters.js';
import { RetryExecutor } from './retryExecutor.js';
import { IteratorChunkStream, type ChunkStream } from './upstream/chunkStream.js';

import type { UpstreamService } from './contracts.js';
import type {
  ChatCompletion,
  ChatCompletionChunk,
  CompletionParams,
  CreateEmbeddingResponse,
  EmbeddingCreateParams,
  UpstreamHealth,
  UpstreamModel,
  UpstreamSettings,
} from '../types/index.js';

export interface UpstreamServiceOptions {
  counters?: RequestCounters;
  retryExecutor?: RetryExecutor;
}

class OpenAIUpstreamService implements UpstreamService {
  private client: OpenAI | undefined;
  private agent: Agent | undefined;
  private readonly counters: RequestCounters;
  private readonly retry: RetryExecutor;

  constructor(
    private readonly settings: UpstreamSettings,
    options: UpstreamServiceOptions = {},
  ) {
    this.counters = options.counters ?? new RequestCounters();
    this.retry = options.retryExecutor ?? new RetryExecutor({ counters: this.counters });
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }

    const { baseUrl, apiKey, requestTimeoutMs, maxConnections, keepAliveTimeoutMs } = this.settings;
    const agent = new Agent({
      connections: maxConnections,
      keepAliveTimeout: keepAliveTimeoutMs,
      connectTimeout: requestTimeoutMs,
      headersTimeout: requestTimeoutMs,
      bodyTimeout: requestTimeoutMs,
    });

    this.agent = agent;
    this.client = new OpenAI({
      apiKey,
      baseURL: baseUrl,
      timeout: requestTimeoutMs,
      // Retries are ours, so the SDK never retries on its own
      maxRetries: 0,
      fetchOptions: { dispatcher: agent },
    });

    logger.debug(
      `[UPSTREAM] Client created for ${baseUrl} (pool=${maxConnections}, timeout=${requestTimeoutMs}ms)`,
    );
    return this.client;
  }

  async listModels(): Promise<UpstreamModel[]> {
    return this.retry.execute('list_models', async () => {
      const page = await this.getClient().models.list();
      logger.debug(`[UPSTREAM] Listed ${page.data.length} models`);
      return page.data;
    });
  }

  async createCompletion(params: CompletionParams): Promise<ChatCompletion> {
    return this.retry.execute('chat_completion', async () =>
      this.getClient().chat.completions.create({ ...params, stream: false }),
    );
  }

  async createCompletionStream(
    params: CompletionParams,
    signal?: AbortSignal,
  ): Promise<ChunkStream<ChatCompletionChunk>> {
    const stream = await this.retry.execute(
      'chat_completion_stream',
      async () => this.getClient().chat.completions.create({ ...params, stream: true }, signal ? { signal } : {}),
      signal,
    );
    logger.debug(`[UPSTREAM] Stream opened for model ${params.model}`);
    return new IteratorChunkStream(stream, () => stream.controller.abort());
  }

  async createEmbedding(params: EmbeddingCreateParams): Promise<CreateEmbeddingResponse> {
    // Without it the SDK asks for base64 and decodes the vectors to float32
    return this.retry.execute('embedding', async () =>
      this.getClient().embeddings.create({ ...params, encoding_format: 'float' }),
    );
  }

  async healthCheck(): Promise<UpstreamHealth> {
    try {
      const models = await this.listModels();
      return { status: 'healthy', modelsAvailable: models.length, ...this.counters.snapshot() };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[UPSTREAM] Health check failed: ${message}`);
      return { status: 'unhealthy', error: message, ...this.counters.snapshot() };
    }
  }

  async close(): Promise<void> {
    const agent = this.agent;
    this.client = undefined;
    this.agent = undefined;
    if (agent) {
      await agent.destroy();
      logger.debug('[UPSTREAM] Connection pool closed');
    }
  }
}

export function createUpstreamService(
  settings: UpstreamSettings,
  options: UpstreamServiceOptions = {},
): UpstreamService {
  return new OpenAIUpstreamService(settings, options);
}

export { OpenAIUpstreamService };
