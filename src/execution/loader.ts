/**
 * Request execution.
 *
 * @module execution/loader
 */

import { Timer } from '../observability/metrics.js';
import type { Requestable } from '../request/requestable.js';
import type { DataResponse } from '../types/responses.js';
import { Metrics, Response } from './response.js';

/**
 * Performs the I/O for a request. The single required primitive of the
 * execution layer; {@link loadResponse} derives timed envelopes from it.
 *
 * Implementations must be safe to call concurrently for distinct requests.
 * Timeouts and cancellation are theirs to implement.
 *
 * @template T - Raw result shape
 */
export interface RequestLoader<T = DataResponse> {
  data(request: Requestable): Promise<T>;
}

/**
 * Executes `request` once through `loader` and wraps the result with its
 * timing.
 *
 * The clock starts immediately before `data` is called and stops as soon as
 * it settles; awaiting `data` is the only suspension point. A rejection from
 * `data` propagates unchanged and produces neither an envelope nor metrics.
 *
 * @example
 * ```typescript
 * const response = await loadResponse(loader, RequestDescription.get('https://example.com'));
 * console.log(`took ${response.metrics.duration}s`);
 * ```
 */
export async function loadResponse<R extends Requestable, T>(
  loader: RequestLoader<T>,
  request: R
): Promise<Response<R, T>> {
  const timer = Timer.start();
  const result = await loader.data(request);
  const metrics = new Metrics(timer.startDate, timer.elapsedSeconds());
  return new Response(request, result, metrics);
}
