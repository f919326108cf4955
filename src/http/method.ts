/**
 * HTTP method vocabulary.
 *
 * @module http/method
 */

/**
 * An HTTP method token.
 *
 * Tokens are case-sensitive and are never validated, so any string a server
 * might accept can be carried through unchanged. Two methods are equal when
 * their tokens are byte-equal.
 *
 * See https://tools.ietf.org/html/rfc7231#section-4.3
 *
 * @example
 * ```typescript
 * HttpMethod.get.equals(new HttpMethod('GET')); // true
 * new HttpMethod('PURGE').rawValue;            // 'PURGE'
 * ```
 */
export class HttpMethod {
  static readonly connect = new HttpMethod('CONNECT');
  static readonly delete = new HttpMethod('DELETE');
  static readonly get = new HttpMethod('GET');
  static readonly head = new HttpMethod('HEAD');
  static readonly options = new HttpMethod('OPTIONS');
  static readonly patch = new HttpMethod('PATCH');
  static readonly post = new HttpMethod('POST');
  static readonly put = new HttpMethod('PUT');
  static readonly trace = new HttpMethod('TRACE');

  constructor(public readonly rawValue: string) {}

  equals(other: HttpMethod): boolean {
    return this.rawValue === other.rawValue;
  }

  /**
   * Key usable in a `Map` or `Set` of primitive values.
   */
  hashKey(): string {
    return this.rawValue;
  }

  toString(): string {
    return this.rawValue;
  }
}
