import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";

import {
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_MULTIPLIER,
} from "./constants/retry.js";
import { createLogger } from "./logging/configLogger.js";

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

interface ShimConfig {
  server: {
    host: string;
    port: number;
    debugMode: boolean;
  };
  upstream: {
    baseUrl: string;
    requestTimeoutSeconds: number;
    maxConnections: number;
    keepAliveTimeoutMs: number;
  };
  retry: {
    maxRetries: number;
    initialDelayMs: number;
    multiplier: number;
    maxDelayMs: number;
  };
  ollama: {
    version: string;
  };
  validation: {
    placeholders: {
      apiKey: string;
    };
  };
}

const DEFAULT_CONFIG: ShimConfig = {
  server: {
    host: "0.0.0.0",
    port: 11434,
    debugMode: false,
  },
  upstream: {
    // Hardcoded fallback if config.json is missing
    baseUrl: "https://api.openai.com/v1",
    requestTimeoutSeconds: 300,
    maxConnections: 100,
    keepAliveTimeoutMs: 30_000,
  },
  retry: {
    maxRetries: DEFAULT_MAX_RETRIES,
    initialDelayMs: DEFAULT_INITIAL_DELAY_MS,
    multiplier: DEFAULT_RETRY_MULTIPLIER,
    maxDelayMs: DEFAULT_MAX_DELAY_MS,
  },
  ollama: {
    version: "0.12.6",
  },
  validation: {
    placeholders: {
      apiKey: "YOUR_API_KEY_HERE",
    },
  },
};

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

function coalesceEnv(...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = getEnv(key);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function loadConfigFromFile(): DeepPartial<ShimConfig> {
  try {
    const configPath = join(process.cwd(), "config.json");
    const configFile = readFileSync(configPath, "utf8");
    return JSON.parse(configFile) as DeepPartial<ShimConfig>;
  } catch (error: unknown) {
    // Can't use logger here as it's not created yet
    console.warn(`[CONFIG] Unable to load config.json (${error instanceof Error ? error.message : "Unknown error"}). Using defaults.`);
    return {};
  }
}

const fileConfig = loadConfigFromFile();

const debugMode = fileConfig.server?.debugMode ?? DEFAULT_CONFIG.server.debugMode;
const logger = createLogger(debugMode);

export const config: ShimConfig = {
  server: {
    host: fileConfig.server?.host ?? DEFAULT_CONFIG.server.host,
    port: fileConfig.server?.port ?? DEFAULT_CONFIG.server.port,
    debugMode,
  },
  upstream: {
    baseUrl: fileConfig.upstream?.baseUrl ?? DEFAULT_CONFIG.upstream.baseUrl,
    requestTimeoutSeconds:
      fileConfig.upstream?.requestTimeoutSeconds ?? DEFAULT_CONFIG.upstream.requestTimeoutSeconds,
    maxConnections: fileConfig.upstream?.maxConnections ?? DEFAULT_CONFIG.upstream.maxConnections,
    keepAliveTimeoutMs:
      fileConfig.upstream?.keepAliveTimeoutMs ?? DEFAULT_CONFIG.upstream.keepAliveTimeoutMs,
  },
  retry: {
    maxRetries: fileConfig.retry?.maxRetries ?? DEFAULT_CONFIG.retry.maxRetries,
    initialDelayMs: fileConfig.retry?.initialDelayMs ?? DEFAULT_CONFIG.retry.initialDelayMs,
    multiplier: fileConfig.retry?.multiplier ?? DEFAULT_CONFIG.retry.multiplier,
    maxDelayMs: fileConfig.retry?.maxDelayMs ?? DEFAULT_CONFIG.retry.maxDelayMs,
  },
  ollama: {
    version: fileConfig.ollama?.version ?? DEFAULT_CONFIG.ollama.version,
  },
  validation: {
    placeholders: {
      apiKey:
        fileConfig.validation?.placeholders?.apiKey
        ?? DEFAULT_CONFIG.validation.placeholders.apiKey,
    },
  },
};

export const PLACEHOLDER_API_KEY = config.validation.placeholders.apiKey;

// ============================================================================
// CONFIGURATION (SSOT: config.json)
// Non-secret values come from config.json; environment variables carry secrets
// and a few deployment overrides (port, upstream URL).
// ============================================================================

export const PROXY_PORT = Number(getEnv("PROXY_PORT") ?? config.server.port);
export const PROXY_HOST = config.server.host;
export const DEBUG_MODE = config.server.debugMode;

const RAW_UPSTREAM_BASE_URL = getEnv("OPENAI_API_BASE_URL") ?? config.upstream.baseUrl;
export const UPSTREAM_BASE_URL = RAW_UPSTREAM_BASE_URL.replace(/\/+$/, "");

export const REQUEST_TIMEOUT_MS = config.upstream.requestTimeoutSeconds * 1000;
export const MAX_CONNECTIONS = config.upstream.maxConnections;
export const KEEP_ALIVE_TIMEOUT_MS = config.upstream.keepAliveTimeoutMs;

export const RETRY_MAX_RETRIES = config.retry.maxRetries;
export const RETRY_INITIAL_DELAY_MS = config.retry.initialDelayMs;
export const RETRY_MULTIPLIER = config.retry.multiplier;
export const RETRY_MAX_DELAY_MS = config.retry.maxDelayMs;

export const OLLAMA_VERSION = config.ollama.version;

// ============================================================================
// SECRETS (from .env)
// ============================================================================

export const UPSTREAM_API_KEY = coalesceEnv("OPENAI_API_KEY", "UPSTREAM_API_KEY") ?? "";

export function validateConfig(): void {
  const errors: string[] = [];

  if (!/^https?:\/\//.test(UPSTREAM_BASE_URL)) {
    errors.push(`Upstream base URL must start with http:// or https://. Got: ${UPSTREAM_BASE_URL || "(empty)"}`);
  }

  if (UPSTREAM_API_KEY === "" || UPSTREAM_API_KEY === PLACEHOLDER_API_KEY) {
    errors.push("OPENAI_API_KEY is required (set it in .env or the environment)");
  }

  if (Number.isNaN(PROXY_PORT) || PROXY_PORT < 1 || PROXY_PORT > 65_535) {
    errors.push("PROXY_PORT must be a valid port number between 1 and 65535");
  }

  if (!(config.upstream.requestTimeoutSeconds >= 1)) {
    errors.push("upstream.requestTimeoutSeconds must be at least 1");
  }

  if (!Number.isInteger(MAX_CONNECTIONS) || MAX_CONNECTIONS < 1) {
    errors.push("upstream.maxConnections must be a positive integer");
  }

  if (!Number.isInteger(RETRY_MAX_RETRIES) || RETRY_MAX_RETRIES < 0) {
    errors.push("retry.maxRetries must be a non-negative integer");
  }

  if (RETRY_MULTIPLIER < 1 || RETRY_INITIAL_DELAY_MS < 0 || RETRY_MAX_DELAY_MS < RETRY_INITIAL_DELAY_MS) {
    errors.push("retry delays must satisfy 0 <= initialDelayMs <= maxDelayMs and multiplier >= 1");
  }

  if (errors.length > 0) {
    const errorMessage = `Configuration validation failed:\n${errors.map((error) => `- ${error}`).join("\n")}`;
    logger.error(errorMessage);
    throw new Error(errorMessage);
  }

  logger.info("Shim Configuration (SSOT: config.json):");
  logger.info(`  Upstream URL: ${UPSTREAM_BASE_URL}`);
  logger.info(`  Request Timeout: ${config.upstream.requestTimeoutSeconds}s`);
  logger.info(`  Connection Pool: ${MAX_CONNECTIONS}`);
  logger.info(
    `  Retry: ${RETRY_MAX_RETRIES} retries, ${RETRY_INITIAL_DELAY_MS}ms x${RETRY_MULTIPLIER} (max ${RETRY_MAX_DELAY_MS}ms)`,
  );
  logger.info(`  Debug Mode: ${DEBUG_MODE ? "ENABLED" : "DISABLED"}`);
}
