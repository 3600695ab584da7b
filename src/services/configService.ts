/**
 * Configuration Service Implementation
 *
 * SSOT for all configuration. Environment variables are read ONCE at startup.
 * All config access MUST go through this service.
 */

import {
  DEBUG_MODE,
  KEEP_ALIVE_TIMEOUT_MS,
  MAX_CONNECTIONS,
  OLLAMA_VERSION,
  PLACEHOLDER_API_KEY,
  PROXY_HOST,
  PROXY_PORT,
  REQUEST_TIMEOUT_MS,
  RETRY_INITIAL_DELAY_MS,
  RETRY_MAX_DELAY_MS,
  RETRY_MAX_RETRIES,
  RETRY_MULTIPLIER,
  UPSTREAM_API_KEY,
  UPSTREAM_BASE_URL,
} from '../config.js';

import type { ConfigService } from './contracts.js';
import type { ConfigSummary, RetryPolicy, UpstreamSettings } from '../types/index.js';

class ConfigServiceImpl implements ConfigService {
  getUpstreamSettings(): UpstreamSettings {
    return {
      baseUrl: UPSTREAM_BASE_URL,
      apiKey: UPSTREAM_API_KEY,
      requestTimeoutMs: REQUEST_TIMEOUT_MS,
      maxConnections: MAX_CONNECTIONS,
      keepAliveTimeoutMs: KEEP_ALIVE_TIMEOUT_MS,
    };
  }

  getRetryPolicy(): RetryPolicy {
    return {
      maxRetries: RETRY_MAX_RETRIES,
      initialDelayMs: RETRY_INITIAL_DELAY_MS,
      multiplier: RETRY_MULTIPLIER,
      maxDelayMs: RETRY_MAX_DELAY_MS,
    };
  }

  getProxyPort(): number {
    return PROXY_PORT;
  }

  getProxyHost(): string {
    return PROXY_HOST;
  }

  getOllamaVersion(): string {
    return OLLAMA_VERSION;
  }

  isDebugMode(): boolean {
    return DEBUG_MODE;
  }

  getConfigSummary(): ConfigSummary {
    return {
      upstream_base_url: UPSTREAM_BASE_URL,
      proxy_host: PROXY_HOST,
      proxy_port: PROXY_PORT,
      debug_mode: DEBUG_MODE,
      request_timeout_seconds: REQUEST_TIMEOUT_MS / 1000,
      max_retries: RETRY_MAX_RETRIES,
      api_key_configured: UPSTREAM_API_KEY !== '' && UPSTREAM_API_KEY !== PLACEHOLDER_API_KEY,
    };
  }
}

export const configService = new ConfigServiceImpl();
