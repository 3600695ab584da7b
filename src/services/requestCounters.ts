/**
 * Request Counters
 *
 * Process-wide totals of upstream attempts and failures. One instance is
 * created at startup and handed to whoever records or reports traffic.
 */

import type { CounterSnapshot } from '../types/index.js';

export class RequestCounters {
  private requests = 0;
  private errors = 0;
  private lastRequestAt: Date | null = null;

  recordRequest(): void {
    this.requests += 1;
    this.lastRequestAt = new Date();
  }

  recordError(): void {
    this.errors += 1;
  }

  get requestCount(): number {
    return this.requests;
  }

  get errorCount(): number {
    return this.errors;
  }

  get lastRequestTime(): Date | null {
    return this.lastRequestAt;
  }

  /** errorRate is 0 until the first request */
  snapshot(): CounterSnapshot {
    return {
      requestCount: this.requests,
      errorCount: this.errors,
      errorRate: this.requests === 0 ? 0 : this.errors / this.requests,
    };
  }
}
