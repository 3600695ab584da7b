/**
 * HTTP request metrics reported by GET /metrics.
 * Counts client requests as they complete; a status >= 400 is a failure.
 */

export interface RequestMetricsSnapshot {
  total: number;
  success: number;
  failed: number;
  success_rate_percent: number;
  last_request_time: string | null;
}

export class RequestMetrics {
  private total = 0;
  private success = 0;
  private failed = 0;
  private lastRequestTime: string | null = null;

  record(status: number, at: Date = new Date()): void {
    this.total += 1;
    if (status >= 400) {
      this.failed += 1;
    } else {
      this.success += 1;
    }
    this.lastRequestTime = at.toISOString();
  }

  snapshot(): RequestMetricsSnapshot {
    const rate = this.total === 0 ? 0 : (this.success / this.total) * 100;
    return {
      total: this.total,
      success: this.success,
      failed: this.failed,
      success_rate_percent: Math.round(rate * 100) / 100,
      last_request_time: this.lastRequestTime,
    };
  }
}
