/**
 * Health Monitoring Service
 *
 * Tracks performance metrics for observability:
 * - Query latency (p50, p95, p99)
 * - Client failures (unknown names, malformed searches)
 * - Server error rate
 * - Loaded dataset size
 *
 * Backs the /health endpoint and the Prometheus-format /metrics endpoint.
 */

import type {
  DatasetMetrics,
  ErrorMetrics,
  ErrorSample,
  HealthMetrics,
  QueryMetrics,
} from './types.js';

export class HealthMonitor {
  private startTime: number;
  private queryCount = 0;
  private successCount = 0;
  private failureCount = 0;
  private latencies: number[] = [];
  private errors: ErrorSample[] = [];

  private readonly ERROR_WINDOW_5M = 5 * 60 * 1000;
  private readonly ERROR_WINDOW_1H = 60 * 60 * 1000;
  private readonly ERROR_WINDOW_24H = 24 * 60 * 60 * 1000;

  constructor(private readonly dataset: DatasetMetrics) {
    this.startTime = Date.now();
  }

  /**
   * Record a request answered with 2xx
   */
  recordQuery(latencyMs: number): void {
    this.queryCount++;
    this.successCount++;
    this.pushLatency(latencyMs);
  }

  /**
   * Record a request rejected with 4xx
   */
  recordFailure(latencyMs: number): void {
    this.queryCount++;
    this.failureCount++;
    this.pushLatency(latencyMs);
  }

  /**
   * Record a request that failed with 5xx
   */
  recordError(error: string, path?: string): void {
    this.queryCount++;
    this.failureCount++;

    this.errors.push({ timestamp: Date.now(), error, path });

    // Keep last 1000 errors
    if (this.errors.length > 1000) {
      this.errors.shift();
    }
  }

  getMetrics(): HealthMetrics {
    const now = Date.now();
    const uptime = (now - this.startTime) / 1000;

    const queries: QueryMetrics = {
      total: this.queryCount,
      successful: this.successCount,
      failed: this.failureCount,
      latencyP50: this.calculatePercentile(0.5),
      latencyP95: this.calculatePercentile(0.95),
      latencyP99: this.calculatePercentile(0.99),
      throughput: uptime > 0 ? this.queryCount / uptime : 0,
    };

    const errors: ErrorMetrics = {
      last5m: this.countErrorsInWindow(this.ERROR_WINDOW_5M),
      last1h: this.countErrorsInWindow(this.ERROR_WINDOW_1H),
      last24h: this.countErrorsInWindow(this.ERROR_WINDOW_24H),
      recentErrors: this.errors.slice(-10),
    };

    return {
      status: this.determineHealthStatus(queries, errors),
      uptime,
      queries,
      errors,
      dataset: this.dataset,
      timestamp: now,
    };
  }

  /**
   * Export Prometheus-compatible metrics
   */
  exportPrometheus(): string {
    const metrics = this.getMetrics();
    const lines: string[] = [];

    lines.push('# HELP barangay_api_queries_total Total number of API queries');
    lines.push('# TYPE barangay_api_queries_total counter');
    lines.push(`barangay_api_queries_total ${metrics.queries.total}`);

    lines.push('# HELP barangay_api_query_failures_total Queries answered with an error');
    lines.push('# TYPE barangay_api_query_failures_total counter');
    lines.push(`barangay_api_query_failures_total ${metrics.queries.failed}`);

    lines.push('# HELP barangay_api_query_latency_seconds Query latency percentiles');
    lines.push('# TYPE barangay_api_query_latency_seconds summary');
    lines.push(`barangay_api_query_latency_seconds{quantile="0.5"} ${metrics.queries.latencyP50 / 1000}`);
    lines.push(`barangay_api_query_latency_seconds{quantile="0.95"} ${metrics.queries.latencyP95 / 1000}`);
    lines.push(`barangay_api_query_latency_seconds{quantile="0.99"} ${metrics.queries.latencyP99 / 1000}`);

    lines.push('# HELP barangay_api_dataset_areas Administrative areas loaded');
    lines.push('# TYPE barangay_api_dataset_areas gauge');
    lines.push(`barangay_api_dataset_areas ${metrics.dataset.areas}`);

    // 0=degraded, 1=healthy
    lines.push('# HELP barangay_api_health Health status');
    lines.push('# TYPE barangay_api_health gauge');
    lines.push(`barangay_api_health ${metrics.status === 'healthy' ? 1 : 0}`);

    return lines.join('\n') + '\n';
  }

  reset(): void {
    this.startTime = Date.now();
    this.queryCount = 0;
    this.successCount = 0;
    this.failureCount = 0;
    this.latencies = [];
    this.errors = [];
  }

  private pushLatency(latencyMs: number): void {
    this.latencies.push(latencyMs);

    // Keep last 10,000 latencies for accurate percentiles
    if (this.latencies.length > 10000) {
      this.latencies.shift();
    }
  }

  private calculatePercentile(p: number): number {
    if (this.latencies.length === 0) {
      return 0;
    }

    const sorted = [...this.latencies].sort((a, b) => a - b);
    const index = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.max(0, index)];
  }

  private countErrorsInWindow(windowMs: number): number {
    const cutoff = Date.now() - windowMs;
    return this.errors.filter((e) => e.timestamp >= cutoff).length;
  }

  private determineHealthStatus(
    queries: QueryMetrics,
    errors: ErrorMetrics
  ): 'healthy' | 'degraded' {
    if (errors.last5m > 10) {
      return 'degraded';
    }
    if (queries.latencyP95 > 250) {
      return 'degraded';
    }
    if (this.dataset.areas === 0) {
      return 'degraded';
    }
    return 'healthy';
  }
}
