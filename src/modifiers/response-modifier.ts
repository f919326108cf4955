/**
 * Post-flight response modifiers.
 *
 * @module modifiers/response-modifier
 */

import type { Response } from '../execution/response.js';
import type { Logger } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import type { Requestable } from '../request/requestable.js';
import type { DataResponse } from '../types/responses.js';

/**
 * Transforms a response envelope after execution.
 *
 * Modifiers may rewrite `metrics` or `result`. They keep `request` unless
 * replacing it is their purpose, and return a new envelope rather than
 * changing the one they receive.
 *
 * @template T - Raw result shape the modifier reads and produces
 *
 * @example
 * ```typescript
 * class TrimBody implements ResponseModifier {
 *   mutate<R extends Requestable>(response: Response<R, DataResponse>): Response<R, DataResponse> {
 *     const { data, urlResponse } = response.result;
 *     return response.with({ result: { data: data.subarray(0, 1024), urlResponse } });
 *   }
 * }
 * ```
 */
export interface ResponseModifier<T = DataResponse> {
  mutate<R extends Requestable>(response: Response<R, T>): Response<R, T>;
}

/**
 * Applies `modifiers` in order. An empty list returns `response`.
 */
export function applyResponseModifiers<R extends Requestable, T>(
  response: Response<R, T>,
  modifiers: readonly ResponseModifier<T>[]
): Response<R, T> {
  return modifiers.reduce((current, modifier) => modifier.mutate(current), response);
}

/**
 * Wraps a function as a {@link ResponseModifier}.
 */
export function responseModifier<T = DataResponse>(
  mutate: <R extends Requestable>(response: Response<R, T>) => Response<R, T>
): ResponseModifier<T> {
  return { mutate };
}

/**
 * Reads an HTTP status code out of a raw result, when it carries one.
 */
function statusCodeOf(result: unknown): number | undefined {
  if (typeof result !== 'object' || result === null || !('urlResponse' in result)) {
    return undefined;
  }
  const { urlResponse } = result;
  if (typeof urlResponse !== 'object' || urlResponse === null || !('statusCode' in urlResponse)) {
    return undefined;
  }
  return typeof urlResponse.statusCode === 'number' ? urlResponse.statusCode : undefined;
}

/**
 * Logs each response at debug level. Returns the envelope untouched.
 */
export class LoggingResponseModifier<T = DataResponse> implements ResponseModifier<T> {
  constructor(private readonly logger: Logger) {}

  mutate<R extends Requestable>(response: Response<R, T>): Response<R, T> {
    this.logger.debug('Response received', {
      method: response.request.method.rawValue,
      statusCode: statusCodeOf(response.result),
      durationMs: response.metrics.durationMs,
    });
    return response;
  }
}

/**
 * Records each response's timing into a {@link MetricsCollector}. Returns the
 * envelope untouched.
 *
 * The collector is shared between concurrent executions; keeping it
 * consistent is the collector's job.
 */
export class MetricsRecordingModifier<T = DataResponse> implements ResponseModifier<T> {
  constructor(
    private readonly collector: MetricsCollector,
    private readonly urlOf: (request: Requestable) => string = defaultUrlOf
  ) {}

  mutate<R extends Requestable>(response: Response<R, T>): Response<R, T> {
    this.collector.record({
      url: this.urlOf(response.request),
      method: response.request.method.rawValue,
      statusCode: statusCodeOf(response.result),
      durationMs: response.metrics.durationMs,
      startedAt: response.metrics.startDate,
    });
    return response;
  }
}

function defaultUrlOf(request: Requestable): string {
  if ('url' in request && typeof request.url === 'string') {
    return request.url;
  }
  if ('baseURLString' in request && typeof request.baseURLString === 'string') {
    return request.baseURLString;
  }
  return 'unknown';
}
