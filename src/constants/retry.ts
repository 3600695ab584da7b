/**
 * Retry policy defaults for upstream calls.
 * Overridable through the `retry` section of config.json.
 */

/** Retries after the first attempt; total attempts = DEFAULT_MAX_RETRIES + 1 */
export const DEFAULT_MAX_RETRIES = 3;

export const DEFAULT_INITIAL_DELAY_MS = 1_000;

export const DEFAULT_RETRY_MULTIPLIER = 2;

export const DEFAULT_MAX_DELAY_MS = 30_000;
