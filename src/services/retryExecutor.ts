/**
 * Retry Executor
 *
 * Runs an upstream operation with exponential backoff. Only transient
 * failures (connection, timeout, rate limit, 5xx) are retried; anything else
 * is rethrown untouched so the error translator still sees the original.
 */

import { randomBytes } from 'crypto';
import { setTimeout as delayFor } from 'timers/promises';

import {
  DEFAULT_INITIAL_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_MULTIPLIER,
} from '../constants/retry.js';
import { logger as defaultLogger, type Logger } from '../logging/index.js';
import { classifyUpstreamError, isRetryable } from '../translation/errors/classify.js';

import type { RequestCounters } from './requestCounters.js';
import type { RetryPolicy } from '../types/index.js';

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxRetries: DEFAULT_MAX_RETRIES,
  initialDelayMs: DEFAULT_INITIAL_DELAY_MS,
  multiplier: DEFAULT_RETRY_MULTIPLIER,
  maxDelayMs: DEFAULT_MAX_DELAY_MS,
});

/** Rejects early when `signal` aborts */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

const sleep: SleepFn = (ms, signal) => delayFor(ms, undefined, { signal });

export class RetryExhaustedError extends Error {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${operation} failed after ${attempts} attempts: ${reason}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export interface RetryExecutorOptions {
  policy?: Partial<RetryPolicy>;
  counters?: RequestCounters;
  sleep?: SleepFn;
  logger?: Logger;
}

/**
 * Delays before each retry: initial, then multiplied and capped at maxDelayMs
 */
export function computeBackoffSchedule(policy: RetryPolicy): number[] {
  const delays: number[] = [];
  let delay = policy.initialDelayMs;
  for (let retry = 0; retry < policy.maxRetries; retry++) {
    delays.push(delay);
    delay = Math.min(delay * policy.multiplier, policy.maxDelayMs);
  }
  return delays;
}

export class RetryExecutor {
  readonly policy: Readonly<RetryPolicy>;
  private readonly counters: RequestCounters | undefined;
  private readonly sleep: SleepFn;
  private readonly logger: Logger;

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = Object.freeze({ ...DEFAULT_RETRY_POLICY, ...options.policy });
    this.counters = options.counters;
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Once `signal` aborts, no further attempt starts and a pending backoff
   * sleep ends; the abort reason is thrown.
   */
  async execute<T>(operationName: string, operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const callId = `call_${randomBytes(4).toString('hex')}`;
    const totalAttempts = this.policy.maxRetries + 1;
    const startedAt = Date.now();
    let delay = this.policy.initialDelayMs;
    let lastError: unknown;

    for (let attempt = 1; attempt <= totalAttempts; attempt++) {
      this.throwIfCancelled(signal, callId, operationName, attempt);
      this.counters?.recordRequest();
      this.logger.debug(
        `[RETRY] ${callId} ${operationName} attempt ${attempt}/${totalAttempts} started`,
      );

      try {
        const result = await operation();
        this.logger.debug(
          `[RETRY] ${callId} ${operationName} succeeded on attempt ${attempt} after ${Date.now() - startedAt}ms`,
        );
        return result;
      } catch (error: unknown) {
        this.counters?.recordError();
        lastError = error;
        const elapsed = Date.now() - startedAt;
        const reason = error instanceof Error ? error.message : String(error);

        this.throwIfCancelled(signal, callId, operationName, attempt);
        if (!isRetryable(classifyUpstreamError(error))) {
          this.logger.error(
            `[RETRY] ${callId} ${operationName} failed on attempt ${attempt} after ${elapsed}ms (not retryable): ${reason}`,
          );
          throw error;
        }

        if (attempt === totalAttempts) {
          this.logger.error(
            `[RETRY] ${callId} ${operationName} failed after ${attempt} attempts in ${elapsed}ms: ${reason}`,
          );
          break;
        }

        this.logger.warn(
          `[RETRY] ${callId} ${operationName} attempt ${attempt}/${totalAttempts} failed after ${elapsed}ms, retrying in ${delay}ms: ${reason}`,
        );
        await this.sleep(delay, signal);
        delay = Math.min(delay * this.policy.multiplier, this.policy.maxDelayMs);
      }
    }

    throw new RetryExhaustedError(operationName, totalAttempts, lastError);
  }

  private throwIfCancelled(
    signal: AbortSignal | undefined,
    callId: string,
    operationName: string,
    attempt: number,
  ): void {
    if (signal?.aborted !== true) {
      return;
    }
    this.logger.debug(`[RETRY] ${callId} ${operationName} cancelled at attempt ${attempt}`);
    signal.throwIfAborted();
  }
}
