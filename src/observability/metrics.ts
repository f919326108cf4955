/**
 * Request timing collection.
 */

import { performance } from 'node:perf_hooks';

/**
 * One executed request as seen by a collector.
 */
export interface RequestMetrics {
  /** Target URL. */
  url: string;
  /** Method token. */
  method: string;
  /** HTTP status code, when the result carried one. */
  statusCode?: number;
  /** Wall-clock duration in milliseconds. */
  durationMs: number;
  /** When execution started. */
  startedAt: Date;
}

/**
 * Aggregated view over recorded requests.
 */
export interface AggregatedMetrics {
  totalRequests: number;
  averageLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  byMethod: Record<string, number>;
  byStatusCode: Record<string, number>;
}

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  record(metrics: RequestMetrics): void;
  getAggregated(): AggregatedMetrics;
  reset(): void;
}

/**
 * Keeps the most recent `maxEntries` requests in memory.
 *
 * Recording is synchronous, so concurrent executions on one event loop
 * cannot interleave inside `record`.
 */
export class DefaultMetricsCollector implements MetricsCollector {
  private readonly metrics: RequestMetrics[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries = 1000) {
    this.maxEntries = maxEntries;
  }

  record(metrics: RequestMetrics): void {
    this.metrics.push(metrics);

    if (this.metrics.length > this.maxEntries) {
      this.metrics.shift();
    }
  }

  getAggregated(): AggregatedMetrics {
    const latencies = this.metrics.map((m) => m.durationMs).sort((a, b) => a - b);

    return {
      totalRequests: this.metrics.length,
      averageLatencyMs: this.average(latencies),
      p50LatencyMs: this.percentile(latencies, 50),
      p95LatencyMs: this.percentile(latencies, 95),
      p99LatencyMs: this.percentile(latencies, 99),
      byMethod: this.countBy((m) => m.method),
      byStatusCode: this.countBy((m) => (m.statusCode === undefined ? 'none' : String(m.statusCode))),
    };
  }

  reset(): void {
    this.metrics.length = 0;
  }

  private average(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
  }

  private percentile(sortedValues: number[], percentile: number): number {
    if (sortedValues.length === 0) return 0;
    const index = Math.ceil((percentile / 100) * sortedValues.length) - 1;
    return sortedValues[Math.max(0, index)] ?? 0;
  }

  private countBy(keyFn: (m: RequestMetrics) => string): Record<string, number> {
    const result: Record<string, number> = {};
    for (const m of this.metrics) {
      const key = keyFn(m);
      result[key] = (result[key] ?? 0) + 1;
    }
    return result;
  }
}

export function createMetricsCollector(maxEntries = 1000): MetricsCollector {
  return new DefaultMetricsCollector(maxEntries);
}

/**
 * Wall-clock timer on the monotonic clock, so system clock adjustments
 * never yield a negative duration.
 */
export class Timer {
  /** Calendar time the timer was started. */
  readonly startDate: Date;
  private readonly startMark: number;

  private constructor() {
    this.startDate = new Date();
    this.startMark = performance.now();
  }

  static start(): Timer {
    return new Timer();
  }

  elapsedMs(): number {
    return Math.max(0, performance.now() - this.startMark);
  }

  elapsedSeconds(): number {
    return this.elapsedMs() / 1000;
  }
}
