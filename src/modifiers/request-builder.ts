/**
 * Pre-flight request builders.
 *
 * @module modifiers/request-builder
 */

import { HttpHeader } from '../http/header.js';
import type { MutableRequestable } from '../request/requestable.js';

/**
 * Transforms a request description before it is built.
 *
 * A builder must not modify the description it receives; it returns a copy
 * (usually via `request.with(...)`) carrying its change.
 */
export interface RequestBuilder {
  mutate(request: MutableRequestable): MutableRequestable;
}

/**
 * Applies `builders` in order, each to the previous one's output. Order is
 * significant: two builders setting the same header key leave the later
 * one's value once headers are flattened. An empty list returns `request`.
 */
export function applyRequestBuilders(
  request: MutableRequestable,
  builders: readonly RequestBuilder[]
): MutableRequestable {
  return builders.reduce((current, builder) => builder.mutate(current), request);
}

/**
 * Wraps a plain function as a {@link RequestBuilder}.
 */
export function requestBuilder(
  mutate: (request: MutableRequestable) => MutableRequestable
): RequestBuilder {
  return { mutate };
}

/**
 * Inserts a fixed set of headers.
 */
export class HeaderBuilder implements RequestBuilder {
  private readonly headers: readonly HttpHeader[];

  constructor(...headers: HttpHeader[]) {
    this.headers = headers;
  }

  mutate(request: MutableRequestable): MutableRequestable {
    return request.with({ headers: request.headers.inserting(...this.headers) });
  }
}

/**
 * Inserts headers whose key the request does not carry yet, so values set
 * by the caller are never shadowed.
 */
export class DefaultHeaderBuilder implements RequestBuilder {
  private readonly headers: readonly HttpHeader[];

  constructor(...headers: HttpHeader[]) {
    this.headers = headers;
  }

  mutate(request: MutableRequestable): MutableRequestable {
    const missing = this.headers.filter(
      (header) => request.headers.valuesFor(header.key).length === 0
    );
    if (missing.length === 0) {
      return request;
    }
    return request.with({ headers: request.headers.inserting(...missing) });
  }
}

/**
 * Replaces any Authorization header with a bearer token.
 *
 * The token is read through `getToken` on every call so a caller-owned
 * cache can rotate it.
 */
export class BearerAuthBuilder implements RequestBuilder {
  private readonly getToken: () => string;

  constructor(token: string | (() => string)) {
    this.getToken = typeof token === 'string' ? () => token : token;
  }

  mutate(request: MutableRequestable): MutableRequestable {
    return request.with({
      headers: request.headers
        .removingKey('Authorization')
        .inserting(HttpHeader.authorizationBearer(this.getToken())),
    });
  }
}

/**
 * Points requests at a base URL.
 *
 * With `overwrite` false, only descriptions without a URL are changed.
 */
export class BaseUrlBuilder implements RequestBuilder {
  constructor(
    private readonly baseUrl: string,
    private readonly overwrite = true
  ) {}

  mutate(request: MutableRequestable): MutableRequestable {
    if (!this.overwrite && request.baseURLString !== undefined) {
      return request;
    }
    return request.with({ baseURLString: this.baseUrl });
  }
}
