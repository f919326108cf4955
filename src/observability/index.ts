/**
 * Observability exports.
 */

export type { Logger, LogEntry, LogConfig, LogSink } from './logging.js';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  DEFAULT_LOG_CONFIG,
  createLogger,
  createNoopLogger,
} from './logging.js';

export type { MetricsCollector, RequestMetrics, AggregatedMetrics } from './metrics.js';
export { DefaultMetricsCollector, Timer, createMetricsCollector } from './metrics.js';
