/**
 * HTTP header vocabulary.
 *
 * @module http/header
 */

/**
 * A single header as a `(key, value)` pair.
 *
 * Equality is by the pair: `Accept: text/html` and `Accept: application/json`
 * are two distinct headers and may live side by side in a {@link HeaderSet}.
 *
 * @example
 * ```typescript
 * const auth = HttpHeader.authorizationBearer('test-token');
 * auth.value; // 'Bearer test-token'
 * ```
 */
export class HttpHeader {
  static accept(value: string): HttpHeader {
    return new HttpHeader('Accept', value);
  }

  static acceptEncoding(value: string): HttpHeader {
    return new HttpHeader('Accept-Encoding', value);
  }

  static acceptLanguage(value: string): HttpHeader {
    return new HttpHeader('Accept-Language', value);
  }

  static authorization(value: string): HttpHeader {
    return new HttpHeader('Authorization', value);
  }

  static authorizationBearer(token: string): HttpHeader {
    return new HttpHeader('Authorization', `Bearer ${token}`);
  }

  static cacheControl(value: string): HttpHeader {
    return new HttpHeader('Cache-Control', value);
  }

  static contentLength(value: number): HttpHeader {
    return new HttpHeader('Content-Length', String(value));
  }

  static contentType(value: string): HttpHeader {
    return new HttpHeader('Content-Type', value);
  }

  static cookie(value: string): HttpHeader {
    return new HttpHeader('Cookie', value);
  }

  static host(value: string): HttpHeader {
    return new HttpHeader('Host', value);
  }

  static ifMatch(etag: string): HttpHeader {
    return new HttpHeader('If-Match', etag);
  }

  static ifModifiedSince(date: string): HttpHeader {
    return new HttpHeader('If-Modified-Since', date);
  }

  static ifNoneMatch(etag: string): HttpHeader {
    return new HttpHeader('If-None-Match', etag);
  }

  static ifUnmodifiedSince(date: string): HttpHeader {
    return new HttpHeader('If-Unmodified-Since', date);
  }

  static origin(value: string): HttpHeader {
    return new HttpHeader('Origin', value);
  }

  static referer(value: string): HttpHeader {
    return new HttpHeader('Referer', value);
  }

  static userAgent(value: string): HttpHeader {
    return new HttpHeader('User-Agent', value);
  }

  constructor(
    public readonly key: string,
    public readonly value: string
  ) {}

  equals(other: HttpHeader): boolean {
    return this.key === other.key && this.value === other.value;
  }

  /**
   * Key identifying the pair; distinct pairs never share a key.
   */
  hashKey(): string {
    return JSON.stringify([this.key, this.value]);
  }

  /**
   * True when the header name matches `name`, ignoring case.
   */
  hasKey(name: string): boolean {
    return this.key.toLowerCase() === name.toLowerCase();
  }

  toString(): string {
    return `${this.key}: ${this.value}`;
  }
}
