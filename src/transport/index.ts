/**
 * HTTP transport backed by undici.
 */

import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { DEFAULT_TIMEOUT } from '../config/index.js';
import { TransportError } from '../errors/index.js';
import type { RequestLoader } from '../execution/loader.js';
import type { Requestable } from '../request/requestable.js';
import type { DataResponse } from '../types/responses.js';

/**
 * Options for {@link UndiciRequestLoader}.
 */
export interface UndiciRequestLoaderOptions {
  /** Timeout per request in milliseconds. */
  timeout?: number;
  /** Dispatcher to send through, e.g. a pooled `Agent` or a `MockAgent`. */
  dispatcher?: Dispatcher;
  /** Caller-owned signal that cancels in-flight requests. */
  signal?: AbortSignal;
}

/**
 * {@link RequestLoader} that builds each request and sends it with undici's
 * `fetch`.
 *
 * Every status code resolves; interpreting the body is left to the caller.
 * Build failures reject with the original `BuildError`; network failures,
 * timeouts and aborts reject with a {@link TransportError}.
 *
 * @example
 * ```typescript
 * const loader = new UndiciRequestLoader({ timeout: 10000 });
 * const { data, urlResponse } = await loader.data(RequestDescription.get('https://example.com'));
 * ```
 */
export class UndiciRequestLoader implements RequestLoader<DataResponse> {
  private readonly timeout: number;
  private readonly dispatcher?: Dispatcher;
  private readonly signal?: AbortSignal;

  constructor(options: UndiciRequestLoaderOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.dispatcher = options.dispatcher;
    this.signal = options.signal;
  }

  async data(requestable: Requestable): Promise<DataResponse> {
    const request = requestable.build();

    if (this.signal?.aborted) {
      throw TransportError.aborted(request.url, this.signal.reason);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = (): void => controller.abort();
    this.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.httpMethod,
        headers: { ...request.headerFields },
        body: request.body,
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });

      const data = new Uint8Array(await response.arrayBuffer());

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        data,
        urlResponse: {
          url: response.url || request.url,
          statusCode: response.status,
          headers,
        },
      };
    } catch (error) {
      if (timedOut) {
        throw TransportError.timeout(request.url, this.timeout);
      }
      if (controller.signal.aborted) {
        throw TransportError.aborted(request.url, this.signal?.reason);
      }
      throw TransportError.network(request.url, error);
    } finally {
      clearTimeout(timeoutId);
      this.signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Creates the default transport.
 */
export function createDefaultLoader(options?: UndiciRequestLoaderOptions): UndiciRequestLoader {
  return new UndiciRequestLoader(options);
}
