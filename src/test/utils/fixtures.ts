/**
 * Builders for upstream (OpenAI SDK) objects used across tests
 */

import type {
  ChatCompletion,
  ConfigSummary,
  ChatCompletionChunk,
  CreateEmbeddingResponse,
  FinishReason,
  UpstreamModel,
} from "../../types/index.js";

export const FIXED_CREATED = 1_700_000_000;

export const TEST_CONFIG_SUMMARY: ConfigSummary = {
  upstream_base_url: "http://127.0.0.1:9/v1",
  proxy_host: "127.0.0.1",
  proxy_port: 11434,
  debug_mode: false,
  request_timeout_seconds: 300,
  max_retries: 3,
  api_key_configured: true,
};

export function upstreamModel(id: string, created: number = FIXED_CREATED): UpstreamModel {
  return { id, created, object: "model", owned_by: "test-owner" };
}

export function chatCompletion(
  content: string | null,
  options: { finishReason?: FinishReason; usage?: { prompt: number; completion: number } } = {},
): ChatCompletion {
  const completion: ChatCompletion = {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: FIXED_CREATED,
    model: "gpt-3.5-turbo",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content, refusal: null },
        finish_reason: options.finishReason ?? "stop",
        logprobs: null,
      },
    ],
  };
  if (options.usage) {
    completion.usage = {
      prompt_tokens: options.usage.prompt,
      completion_tokens: options.usage.completion,
      total_tokens: options.usage.prompt + options.usage.completion,
    };
  }
  return completion;
}

export function completionChunk(
  content: string | null | undefined,
  finishReason: FinishReason | null = null,
  usage?: { prompt: number; completion: number },
): ChatCompletionChunk {
  const delta = content === undefined ? {} : { content };

  const chunk: ChatCompletionChunk = {
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: FIXED_CREATED,
    model: "gpt-3.5-turbo",
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
  if (usage) {
    chunk.usage = {
      prompt_tokens: usage.prompt,
      completion_tokens: usage.completion,
      total_tokens: usage.prompt + usage.completion,
    };
  }
  return chunk;
}

/**
 * Text deltas followed by one chunk carrying the finish reason
 */
export function chunkSequence(texts: string[], finishReason: FinishReason = "stop"): ChatCompletionChunk[] {
  return [...texts.map((text) => completionChunk(text)), completionChunk(undefined, finishReason)];
}

export function embeddingResponse(vectors: number[][]): CreateEmbeddingResponse {
  return {
    object: "list",
    model: "text-embedding-ada-002",
    data: vectors.map((embedding, index) => ({ object: "embedding", index, embedding })),
    usage: { prompt_tokens: 3, total_tokens: 3 },
  };
}

/**
 * Deterministic pseudo-random vector, distinct per seed
 */
export function makeVector(length: number, seed = 1): number[] {
  const values: number[] = [];
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (state * 48_271) % 2_147_483_647;
    values.push(state / 2_147_483_647 - 0.5);
  }
  return values;
}
