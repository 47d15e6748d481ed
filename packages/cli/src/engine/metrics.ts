/** Weight kept by the running average on each new sample */
const SMOOTHING = 0.8;

export interface ModelMetricsSnapshot {
  totalRequests: number;
  successRate: number;
  averageResponseTime: number;
  currentLoad: number;
  lastRequest?: Date;
}

/**
 * Running counters for one adapter, owned and mutated by the engine.
 *
 * `averageResponseTime` is in seconds and smoothed exponentially
 * (0.8 old, 0.2 new); the first sample sets it outright.
 */
export class ModelMetrics {
  totalRequests = 0;
  successfulRequests = 0;
  failedRequests = 0;
  averageResponseTime = 0;
  currentLoad = 0;
  lastRequest?: Date;

  get errorRate(): number {
    return this.totalRequests === 0 ? 0 : this.failedRequests / this.totalRequests;
  }

  get successRate(): number {
    return 1 - this.errorRate;
  }

  /** A request was dispatched to the adapter */
  begin(at: Date): void {
    this.currentLoad++;
    this.lastRequest = at;
  }

  recordSuccess(responseTimeSeconds: number): void {
    this.totalRequests++;
    this.successfulRequests++;
    this.averageResponseTime =
      this.averageResponseTime === 0
        ? responseTimeSeconds
        : SMOOTHING * this.averageResponseTime + (1 - SMOOTHING) * responseTimeSeconds;
    this.end();
  }

  recordFailure(): void {
    this.totalRequests++;
    this.failedRequests++;
    this.end();
  }

  snapshot(): ModelMetricsSnapshot {
    return {
      totalRequests: this.totalRequests,
      successRate: this.successRate,
      averageResponseTime: this.averageResponseTime,
      currentLoad: this.currentLoad,
      lastRequest: this.lastRequest,
    };
  }

  private end(): void {
    this.currentLoad = Math.max(0, this.currentLoad - 1);
  }
}
