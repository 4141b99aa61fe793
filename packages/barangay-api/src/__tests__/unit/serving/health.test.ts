/**
 * Health Monitor Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthMonitor } from '../../../serving/health.js';

const DATASET = { regions: 3, areas: 39, barangays: 23, source: 'test bundle' };

describe('HealthMonitor', () => {
  let monitor: HealthMonitor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-07-01T00:00:00Z'));
    monitor = new HealthMonitor(DATASET);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts healthy with empty counters', () => {
    const metrics = monitor.getMetrics();

    expect(metrics.status).toBe('healthy');
    expect(metrics.uptime).toBe(0);
    expect(metrics.queries).toEqual({
      total: 0,
      successful: 0,
      failed: 0,
      latencyP50: 0,
      latencyP95: 0,
      latencyP99: 0,
      throughput: 0,
    });
    expect(metrics.dataset).toEqual(DATASET);
  });

  it('computes latency percentiles', () => {
    for (let latency = 1; latency <= 100; latency++) {
      monitor.recordQuery(latency);
    }

    const { queries } = monitor.getMetrics();
    expect(queries.total).toBe(100);
    expect(queries.latencyP50).toBe(50);
    expect(queries.latencyP95).toBe(95);
    expect(queries.latencyP99).toBe(99);
  });

  it('counts client failures separately from successes', () => {
    monitor.recordQuery(2);
    monitor.recordFailure(1);
    monitor.recordFailure(1);

    const { queries, errors } = monitor.getMetrics();
    expect(queries).toMatchObject({ total: 3, successful: 1, failed: 2 });
    expect(errors.last5m).toBe(0);
  });

  it('reports throughput over uptime', () => {
    monitor.recordQuery(1);
    monitor.recordQuery(1);
    vi.advanceTimersByTime(4000);

    const metrics = monitor.getMetrics();
    expect(metrics.uptime).toBe(4);
    expect(metrics.queries.throughput).toBe(0.5);
  });

  it('windows server errors by age', () => {
    monitor.recordError('first', '/search_barangay');
    vi.advanceTimersByTime(10 * 60 * 1000);
    monitor.recordError('second');

    const { errors } = monitor.getMetrics();
    expect(errors.last5m).toBe(1);
    expect(errors.last1h).toBe(2);
    expect(errors.last24h).toBe(2);
    expect(errors.recentErrors.map((sample) => sample.error)).toEqual(['first', 'second']);
    expect(errors.recentErrors[0].path).toBe('/search_barangay');
  });

  it('degrades after more than 10 errors in 5 minutes', () => {
    for (let i = 0; i < 10; i++) {
      monitor.recordError(`error ${i}`);
    }
    expect(monitor.getMetrics().status).toBe('healthy');

    monitor.recordError('error 10');
    expect(monitor.getMetrics().status).toBe('degraded');
  });

  it('degrades when p95 latency exceeds 250ms', () => {
    monitor.recordQuery(300);

    expect(monitor.getMetrics().status).toBe('degraded');
  });

  it('degrades with an empty dataset', () => {
    const empty = new HealthMonitor({ regions: 0, areas: 0, barangays: 0 });

    expect(empty.getMetrics().status).toBe('degraded');
  });

  it('exports Prometheus metrics', () => {
    monitor.recordQuery(100);
    monitor.recordFailure(100);

    const lines = monitor.exportPrometheus().split('\n');
    expect(lines).toContain('# TYPE barangay_api_queries_total counter');
    expect(lines).toContain('barangay_api_queries_total 2');
    expect(lines).toContain('barangay_api_query_failures_total 1');
    expect(lines).toContain('barangay_api_query_latency_seconds{quantile="0.5"} 0.1');
    expect(lines).toContain('barangay_api_dataset_areas 39');
    expect(lines).toContain('barangay_api_health 1');
  });

  it('reset clears counters', () => {
    monitor.recordQuery(10);
    monitor.recordError('boom');
    monitor.reset();

    const metrics = monitor.getMetrics();
    expect(metrics.queries.total).toBe(0);
    expect(metrics.errors.recentErrors).toEqual([]);
  });
});
