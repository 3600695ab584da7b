/**
 * Ollama API Types (dialect served to clients)
 *
 * Request types mirror what Ollama SDKs send; response types mirror what they
 * parse. Field names stay snake_case because they are wire names.
 */

// ============================================================
// MODEL LISTING (/api/tags)
// ============================================================

export interface OllamaModelDetails {
  parent_model: string;
  format: string;
  family: string;
  families: string[];
  parameter_size: string;
  quantization_level: string;
}

/**
 * One entry of /api/tags. Ollama duplicates the identifier under `name` and
 * `model`; both always hold the same value.
 */
export interface OllamaModel {
  name: string;
  model: string;
  modified_at: string;
  size: number;
  digest: string;
  details: OllamaModelDetails;
}

export interface OllamaTagsResponse {
  models: OllamaModel[];
}

export interface OllamaVersionResponse {
  version: string;
}

// ============================================================
// COMPLETION REQUESTS
// ============================================================

export type OllamaRole = 'system' | 'user' | 'assistant' | 'tool';

export interface OllamaMessage {
  role: OllamaRole;
  content: string;
  images?: string[];
}

export interface OllamaOptions {
  temperature?: number;
  top_p?: number;
  top_k?: number;
  seed?: number;
  num_predict?: number;
  num_ctx?: number;
  repeat_penalty?: number;
  stop?: string | string[];
  [key: string]: unknown;
}

export type OllamaFormat = 'json' | Record<string, unknown>;

export interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  system?: string;
  images?: string[];
  stream?: boolean;
  format?: OllamaFormat;
  options?: OllamaOptions;
  context?: number[];
  template?: string;
  raw?: boolean;
  keep_alive?: string | number;
}

export interface OllamaChatRequest {
  model: string;
  messages: OllamaMessage[];
  stream?: boolean;
  format?: OllamaFormat;
  options?: OllamaOptions;
  keep_alive?: string | number;
}

export interface OllamaEmbeddingsRequest {
  model: string;
  prompt: string;
  options?: OllamaOptions;
  keep_alive?: string | number;
}

// ============================================================
// COMPLETION RESPONSES
// ============================================================

export interface OllamaCompletionStats {
  done_reason?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

export interface OllamaGenerateResponse extends OllamaCompletionStats {
  model: string;
  created_at: string;
  response: string;
  done: true;
  context: number[];
}

export interface OllamaAssistantMessage {
  role: 'assistant';
  content: string;
}

export interface OllamaChatResponse extends OllamaCompletionStats {
  model: string;
  created_at: string;
  message: OllamaAssistantMessage;
  done: true;
}

export interface OllamaEmbeddingsResponse {
  embedding: number[];
}

// ============================================================
// STREAMING CHUNKS (NDJSON records)
// ============================================================

export interface OllamaStreamChunkBase extends OllamaCompletionStats {
  model: string;
  created_at: string;
  done: boolean;
  /** Present only on a terminal record synthesized after an upstream failure */
  error?: string;
  correlation_id?: string;
}

export interface OllamaGenerateChunk extends OllamaStreamChunkBase {
  response: string;
}

export interface OllamaChatChunk extends OllamaStreamChunkBase {
  message: OllamaAssistantMessage;
}

export type OllamaStreamChunk = OllamaGenerateChunk | OllamaChatChunk;

// ============================================================
// ERRORS
// ============================================================

export interface OllamaErrorDetails {
  message: string;
  type: string;
  code: number;
}

export interface OllamaErrorResponse {
  error: OllamaErrorDetails;
  correlation_id: string;
  created_at: string;
  model?: string;
}

/** Legacy single-field error shape */
export interface OllamaSimpleError {
  error: string;
}
