/**
 * Ollama Stream Converter
 *
 * Maps upstream chat-completion chunks onto Ollama NDJSON records.
 * This module focuses ONLY on per-chunk conversion; ordering and
 * finalization belong to the stream relay.
 */

import { DEFAULT_DONE_REASON, nowTimestamp } from './OllamaHelpers.js';

import type {
  ChatCompletionChunk,
  OllamaChatChunk,
  OllamaCompletionStats,
  OllamaGenerateChunk,
  OllamaStreamChunk,
} from '../../../types/index.js';

/**
 * Builds one dialect of stream record. The relay is generic over this, so
 * generate and chat streams share a single state machine.
 */
export interface ChunkBuilder<TChunk extends OllamaStreamChunk> {
  fromUpstream(chunk: ChatCompletionChunk, model: string): TChunk;
  /** Closing record when the upstream ended without a finish reason */
  finalChunk(model: string): TChunk;
  /** Closing record carrying an error */
  errorChunk(model: string, message: string, correlationId: string): TChunk;
}

interface ChunkParts {
  text: string;
  done: boolean;
  stats: OllamaCompletionStats;
}

function splitChunk(chunk: ChatCompletionChunk): ChunkParts {
  const choice = chunk.choices[0];
  const finishReason = choice?.finish_reason ?? null;
  const text = choice?.delta.content ?? '';

  if (finishReason === null) {
    return { text, done: false, stats: {} };
  }

  const stats: OllamaCompletionStats = { done_reason: finishReason };
  if (chunk.usage) {
    stats.prompt_eval_count = chunk.usage.prompt_tokens;
    stats.eval_count = chunk.usage.completion_tokens;
  }
  return { text, done: true, stats };
}

export class GenerateChunkBuilder implements ChunkBuilder<OllamaGenerateChunk> {
  fromUpstream(chunk: ChatCompletionChunk, model: string): OllamaGenerateChunk {
    const { text, done, stats } = splitChunk(chunk);
    return { model, created_at: nowTimestamp(), response: text, done, ...stats };
  }

  finalChunk(model: string): OllamaGenerateChunk {
    return { model, created_at: nowTimestamp(), response: '', done: true, done_reason: DEFAULT_DONE_REASON };
  }

  errorChunk(model: string, message: string, correlationId: string): OllamaGenerateChunk {
    return {
      model,
      created_at: nowTimestamp(),
      response: '',
      done: true,
      error: message,
      correlation_id: correlationId,
    };
  }
}

export class ChatChunkBuilder implements ChunkBuilder<OllamaChatChunk> {
  fromUpstream(chunk: ChatCompletionChunk, model: string): OllamaChatChunk {
    const { text, done, stats } = splitChunk(chunk);
    return { model, created_at: nowTimestamp(), message: { role: 'assistant', content: text }, done, ...stats };
  }

  finalChunk(model: string): OllamaChatChunk {
    return {
      model,
      created_at: nowTimestamp(),
      message: { role: 'assistant', content: '' },
      done: true,
      done_reason: DEFAULT_DONE_REASON,
    };
  }

  errorChunk(model: string, message: string, correlationId: string): OllamaChatChunk {
    return {
      model,
      created_at: nowTimestamp(),
      message: { role: 'assistant', content: '' },
      done: true,
      error: message,
      correlation_id: correlationId,
    };
  }
}

export const generateChunkBuilder = new GenerateChunkBuilder();
export const chatChunkBuilder = new ChatChunkBuilder();
