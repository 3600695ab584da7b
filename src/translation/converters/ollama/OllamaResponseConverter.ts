/**
 * Ollama Response Converter
 *
 * Builds unary Ollama responses from upstream chat completions and embeddings.
 */

import { PLACEHOLDER_CONTEXT, doneReasonOf, nowTimestamp } from './OllamaHelpers.js';

import type {
  ChatCompletion,
  CreateEmbeddingResponse,
  OllamaChatResponse,
  OllamaCompletionStats,
  OllamaEmbeddingsResponse,
  OllamaGenerateResponse,
} from '../../../types/index.js';

function completionStats(completion: ChatCompletion): OllamaCompletionStats {
  const stats: OllamaCompletionStats = {
    done_reason: doneReasonOf(completion.choices[0]?.finish_reason),
  };
  if (completion.usage) {
    stats.prompt_eval_count = completion.usage.prompt_tokens;
    stats.eval_count = completion.usage.completion_tokens;
  }
  return stats;
}

function firstContent(completion: ChatCompletion): string {
  return completion.choices[0]?.message.content ?? '';
}

export class OllamaResponseConverter {
  toGenerateResponse(completion: ChatCompletion, requestedModel: string): OllamaGenerateResponse {
    return {
      model: requestedModel,
      created_at: nowTimestamp(),
      response: firstContent(completion),
      done: true,
      context: [...PLACEHOLDER_CONTEXT],
      ...completionStats(completion),
    };
  }

  toChatResponse(completion: ChatCompletion, requestedModel: string): OllamaChatResponse {
    return {
      model: requestedModel,
      created_at: nowTimestamp(),
      message: { role: 'assistant', content: firstContent(completion) },
      done: true,
      ...completionStats(completion),
    };
  }

  /**
   * First vector, values untouched; `[]` when the upstream returned none
   */
  toEmbeddingsResponse(response: CreateEmbeddingResponse): OllamaEmbeddingsResponse {
    return { embedding: response.data[0]?.embedding ?? [] };
  }
}
