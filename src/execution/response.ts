/**
 * Response envelopes and timing metrics.
 *
 * @module execution/response
 */

import type { Requestable } from '../request/requestable.js';
import type { DataResponse } from '../types/responses.js';

/**
 * Timing of one execution.
 */
export class Metrics {
  /**
   * @param startDate - When execution started
   * @param duration - Wall-clock seconds the execution took
   */
  constructor(
    public readonly startDate: Date,
    public readonly duration: number
  ) {
    Object.freeze(this);
  }

  /** Duration in milliseconds. */
  get durationMs(): number {
    return this.duration * 1000;
  }

  /** When execution finished. */
  get endDate(): Date {
    return new Date(this.startDate.getTime() + this.durationMs);
  }
}

/**
 * Fields of a {@link Response} replaceable through {@link Response.with}.
 */
export interface ResponseFields<R extends Requestable, T> {
  request: R;
  result: T;
  metrics: Metrics;
}

/**
 * The request that was executed, the raw result it produced and how long it
 * took. Envelopes are frozen; modifiers derive new ones with {@link with}.
 *
 * @template R - Request type that was executed
 * @template T - Raw result shape, {@link DataResponse} for the bundled transport
 */
export class Response<R extends Requestable = Requestable, T = DataResponse> {
  constructor(
    public readonly request: R,
    public readonly result: T,
    public readonly metrics: Metrics
  ) {
    Object.freeze(this);
  }

  /**
   * Returns a new envelope with `changes` applied.
   */
  with(changes: Partial<ResponseFields<R, T>>): Response<R, T> {
    return new Response(
      changes.request ?? this.request,
      changes.result !== undefined ? changes.result : this.result,
      changes.metrics ?? this.metrics
    );
  }
}
