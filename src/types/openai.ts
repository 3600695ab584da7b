/**
 * Upstream (OpenAI) API Types
 *
 * SSOT: all upstream shapes come from the `openai` SDK. This file only
 * re-exports them under the names the shim uses.
 */

import type OpenAI from 'openai';

export type UpstreamModel = OpenAI.Model;

export type ChatCompletion = OpenAI.Chat.ChatCompletion;
export type ChatCompletionChunk = OpenAI.Chat.ChatCompletionChunk;
export type ChatCompletionMessageParam = OpenAI.Chat.ChatCompletionMessageParam;
export type ChatCompletionContentPart = OpenAI.Chat.ChatCompletionContentPart;
export type ChatCompletionCreateParams = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

export type EmbeddingCreateParams = OpenAI.EmbeddingCreateParams;
export type CreateEmbeddingResponse = OpenAI.CreateEmbeddingResponse;

export type FinishReason = OpenAI.Chat.ChatCompletion.Choice['finish_reason'];

/**
 * Upstream completion parameters as built by the request converter.
 * `stream` is set by the upstream service, never by callers.
 */
export type CompletionParams = Omit<ChatCompletionCreateParams, 'stream'>;
