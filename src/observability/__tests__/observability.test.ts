/**
 * Tests for logging and metrics
 */

import { describe, it, expect } from 'vitest';
import { ConsoleLogger, LogLevel, NoopLogger, createNoopLogger } from '../logging.js';
import type { LogSink } from '../logging.js';
import { DefaultMetricsCollector, Timer } from '../metrics.js';
import type { RequestMetrics } from '../metrics.js';

function collect(): { lines: Array<[LogLevel, string]>; sink: LogSink } {
  const lines: Array<[LogLevel, string]> = [];
  return { lines, sink: (level, line) => lines.push([level, line]) };
}

describe('ConsoleLogger', () => {
  it('should filter below the configured level', () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ level: LogLevel.Warn, timestamps: false, sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('also shown');

    expect(lines).toEqual([
      [LogLevel.Warn, '[WARN] shown'],
      [LogLevel.Error, '[ERROR] also shown'],
    ]);
  });

  it('should format text with context and error', () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ timestamps: false, sink });

    logger.error('Request failed', new TypeError('bad input'), { attempt: 2 });

    expect(lines).toEqual([[LogLevel.Error, '[ERROR] Request failed {"attempt":2} TypeError: bad input']]);
  });

  it('should format JSON lines', () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ json: true, timestamps: false, sink });

    logger.info('Ready', { port: 8080 });

    expect(lines).toEqual([[LogLevel.Info, '{"level":"info","message":"Ready","port":8080}']]);
  });

  it('should prefix text lines with an ISO timestamp', () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ sink });

    logger.info('Ready');

    expect(lines[0]?.[1]).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[INFO\] Ready$/);
  });

  it('should merge context into child loggers', () => {
    const { lines, sink } = collect();
    const logger = new ConsoleLogger({ timestamps: false, sink, context: { service: 'api' } });

    logger.child({ component: 'pipeline' }).info('Started', { attempt: 1 });

    expect(lines).toEqual([
      [LogLevel.Info, '[INFO] Started {"service":"api","component":"pipeline","attempt":1}'],
    ]);
  });
});

describe('NoopLogger', () => {
  it('should return itself as child', () => {
    const logger = new NoopLogger();

    expect(logger.child({ a: 1 })).toBe(logger);
    expect(createNoopLogger()).toBeInstanceOf(NoopLogger);
  });
});

describe('DefaultMetricsCollector', () => {
  const entry = (durationMs: number, method = 'GET', statusCode?: number): RequestMetrics => ({
    url: 'https://example.com',
    method,
    statusCode,
    durationMs,
    startedAt: new Date(),
  });

  it('should aggregate latencies', () => {
    const collector = new DefaultMetricsCollector();
    for (let ms = 10; ms <= 100; ms += 10) {
      collector.record(entry(ms, ms > 50 ? 'POST' : 'GET', 200));
    }

    const aggregated = collector.getAggregated();

    expect(aggregated.totalRequests).toBe(10);
    expect(aggregated.averageLatencyMs).toBe(55);
    expect(aggregated.p50LatencyMs).toBe(50);
    expect(aggregated.p95LatencyMs).toBe(100);
    expect(aggregated.p99LatencyMs).toBe(100);
    expect(aggregated.byMethod).toEqual({ GET: 5, POST: 5 });
    expect(aggregated.byStatusCode).toEqual({ '200': 10 });
  });

  it('should report zeros when empty', () => {
    const aggregated = new DefaultMetricsCollector().getAggregated();

    expect(aggregated.totalRequests).toBe(0);
    expect(aggregated.averageLatencyMs).toBe(0);
    expect(aggregated.p99LatencyMs).toBe(0);
  });

  it('should keep only the most recent entries', () => {
    const collector = new DefaultMetricsCollector(2);
    collector.record(entry(1));
    collector.record(entry(2));
    collector.record(entry(3));

    const aggregated = collector.getAggregated();

    expect(aggregated.totalRequests).toBe(2);
    expect(aggregated.averageLatencyMs).toBe(2.5);
  });

  it('should reset', () => {
    const collector = new DefaultMetricsCollector();
    collector.record(entry(1));
    collector.reset();

    expect(collector.getAggregated().totalRequests).toBe(0);
  });
});

describe('Timer', () => {
  it('should never report a negative duration', () => {
    const timer = Timer.start();

    expect(timer.elapsedMs()).toBeGreaterThanOrEqual(0);
    expect(timer.elapsedSeconds()).toBeGreaterThanOrEqual(0);
  });
});
