/**
 * Mock infrastructure for testing.
 */

import type { RequestLoader } from '../execution/loader.js';
import type { Requestable } from '../request/requestable.js';
import type { DataResponse, ResponseMetadata } from '../types/responses.js';

/**
 * Recorded request for verification.
 */
export interface RecordedRequest {
  request: Requestable;
  timestamp: Date;
}

/**
 * Scripted outcome of one `data` call.
 */
export interface MockResult<T> {
  /** Value to resolve with. Ignored when `error` is set. */
  result?: T;
  /** Delay in milliseconds before settling. */
  delay?: number;
  /** Error to reject with. */
  error?: unknown;
}

/**
 * Loader that answers from a script instead of a network.
 *
 * Queued results are consumed in order; once the queue is empty every call
 * gets the default result.
 */
export class MockRequestLoader<T = DataResponse> implements RequestLoader<T> {
  private readonly queue: MockResult<T>[] = [];
  private readonly recordedRequests: RecordedRequest[] = [];

  constructor(private readonly defaultResult: MockResult<T>) {}

  /**
   * Queues an outcome for the next unanswered call.
   */
  enqueue(result: MockResult<T>): this {
    this.queue.push(result);
    return this;
  }

  getRecordedRequests(): RecordedRequest[] {
    return [...this.recordedRequests];
  }

  clearRecordedRequests(): this {
    this.recordedRequests.length = 0;
    return this;
  }

  async data(request: Requestable): Promise<T> {
    this.recordedRequests.push({ request, timestamp: new Date() });

    const next = this.queue.shift() ?? this.defaultResult;

    if (next.delay) {
      await this.sleep(next.delay);
    }

    if (next.error !== undefined) {
      throw next.error;
    }
    if (next.result === undefined) {
      throw new Error('MockRequestLoader: no result configured');
    }
    return next.result;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Builds a raw result with a UTF-8 body.
 */
export function dataResponse(
  body: string,
  metadata: Partial<ResponseMetadata> = {}
): DataResponse {
  return {
    data: new TextEncoder().encode(body),
    urlResponse: {
      url: metadata.url ?? 'https://example.com',
      statusCode: metadata.statusCode ?? 200,
      headers: metadata.headers ?? {},
    },
  };
}

/**
 * Creates a mock loader that always answers with `body`.
 */
export function createMockLoader(
  body = '',
  options: { delay?: number; statusCode?: number } = {}
): MockRequestLoader<DataResponse> {
  return new MockRequestLoader<DataResponse>({
    result: dataResponse(body, { statusCode: options.statusCode }),
    delay: options.delay,
  });
}
