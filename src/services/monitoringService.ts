export interface ServiceMetrics {
  requests: number;
  errors: number;
  average_response_time_ms: number;
  uptime_seconds: number;
  last_error: {
    message: string;
    code: string | null;
    at: string;
  } | null;
}

/** Process-local request counters. Reset on restart. */
export class MonitoringService {
  private requests = 0;

  private errors = 0;

  private totalResponseMs = 0;

  private lastError: ServiceMetrics["last_error"] = null;

  private readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  trackRequest(durationMs: number): void {
    this.requests += 1;
    this.totalResponseMs += Math.max(0, durationMs);
  }

  trackError(error: unknown): void {
    this.errors += 1;
    this.lastError = {
      message: error instanceof Error ? error.message : String(error),
      code: hasCode(error) ? error.code : null,
      at: new Date(this.now()).toISOString(),
    };
  }

  getMetrics(): ServiceMetrics {
    return {
      requests: this.requests,
      errors: this.errors,
      average_response_time_ms:
        this.requests === 0 ? 0 : Math.round(this.totalResponseMs / this.requests),
      uptime_seconds: Math.floor((this.now() - this.startedAt) / 1000),
      last_error: this.lastError,
    };
  }
}

function hasCode(error: unknown): error is { code: string } {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}
