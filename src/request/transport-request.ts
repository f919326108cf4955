/**
 * Transport-ready requests.
 *
 * @module request/transport-request
 */

import { decodeJson } from '../encoding/encoders.js';
import { HeaderSet } from '../http/headers.js';
import { HttpMethod } from '../http/method.js';
import type { Parameters } from '../types/parameters.js';
import type { Requestable } from './requestable.js';

/**
 * Options for creating a {@link TransportRequest}.
 */
export interface TransportRequestInit {
  url: string;
  /** Method token; GET is assumed when omitted. */
  method?: string;
  headers?: Record<string, string>;
  body?: Uint8Array;
}

/**
 * A fully resolved request as handed to a transport.
 *
 * It is a {@link Requestable} in its own right: building it returns the same
 * instance, and its description fields are read back from the raw values.
 *
 * @example
 * ```typescript
 * const request = new TransportRequest({
 *   url: 'https://example.com/items',
 *   method: 'POST',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: new TextEncoder().encode('{"name":"widget"}'),
 * });
 *
 * request.parameters; // { name: 'widget' }
 * ```
 */
export class TransportRequest implements Requestable {
  readonly url: string;
  /** Method token as given, possibly unset. */
  readonly httpMethod?: string;
  /** Flat header table sent on the wire. */
  readonly headerFields: Readonly<Record<string, string>>;
  readonly body?: Uint8Array;

  constructor(init: TransportRequestInit) {
    this.url = init.url;
    this.httpMethod = init.method;
    this.headerFields = Object.freeze({ ...init.headers });
    this.body = init.body;
  }

  get headers(): HeaderSet {
    return HeaderSet.fromRecord(this.headerFields);
  }

  get method(): HttpMethod {
    return new HttpMethod(this.httpMethod ?? HttpMethod.get.rawValue);
  }

  /**
   * The body read as a JSON object; empty when there is no body or it is not
   * a JSON object.
   */
  get parameters(): Parameters {
    if (this.body === undefined) {
      return {};
    }
    try {
      return decodeJson(this.body);
    } catch {
      // Not a JSON object
      return {};
    }
  }

  build(): TransportRequest {
    return this;
  }
}
