/**
 * API Endpoint Constants - SSOT for all API routes
 *
 * All endpoint references must import from this file.
 */

/**
 * Ollama API Endpoints served to clients
 * https://github.com/ollama/ollama/blob/main/docs/api.md
 */
export const OLLAMA_ENDPOINTS = {
  /** Chat completions endpoint */
  CHAT: '/api/chat',

  /** Text generation endpoint */
  GENERATE: '/api/generate',

  /** List all available models */
  TAGS: '/api/tags',

  /** Embeddings (legacy single-prompt form) */
  EMBEDDINGS: '/api/embeddings',

  /** Embeddings (alias accepting `input`) */
  EMBED: '/api/embed',

  /** Get Ollama version */
  VERSION: '/api/version',
} as const;

/**
 * Process health endpoints
 */
export const HEALTH_ENDPOINTS = {
  ROOT: '/',
  HEALTH: '/health',
  READY: '/ready',
  LIVE: '/live',
  METRICS: '/metrics',
  UPSTREAM_HEALTH: '/openai/health',
  CONFIG_VALIDATE: '/config/validate',
} as const;

/**
 * Headers the shim reads from or writes to clients
 */
export const SHIM_HEADERS = {
  CORRELATION_ID: 'X-Correlation-ID',
  REQUEST_ID: 'X-Request-ID',
  MODEL_COUNT: 'X-Model-Count',
} as const;

export const NDJSON_CONTENT_TYPE = 'application/x-ndjson';
