/**
 * Declarative request descriptions.
 *
 * @module request/description
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_BASE_URL } from '../config/index.js';
import { defaultEncoderRegistry } from '../encoding/encoders.js';
import type { EncoderRegistry } from '../encoding/encoders.js';
import { encodeMultipart } from '../encoding/multipart.js';
import { BuildError } from '../errors/index.js';
import { MULTIPART_FORM_DATA, ParameterEncoding } from '../http/encoding.js';
import { HttpHeader } from '../http/header.js';
import { HeaderSet } from '../http/headers.js';
import { HttpMethod } from '../http/method.js';
import type { FileParameter } from '../types/file.js';
import type { Parameters } from '../types/parameters.js';
import type { MutableRequestable, MutableRequestFields } from './requestable.js';
import { TransportRequest } from './transport-request.js';

/**
 * Options for creating a {@link RequestDescription}. Every field is optional.
 */
export interface RequestDescriptionInit extends Partial<MutableRequestFields> {
  /** URL used when `baseURLString` is unset. */
  defaultBaseUrl?: string;
  /** Codecs consulted by `build()`. */
  encoders?: EncoderRegistry;
  /** Boundary for multipart bodies; generated once per description when omitted. */
  multipartBoundary?: string;
}

/**
 * The stock {@link MutableRequestable}: a plain record of request fields plus
 * the rules that resolve it into a {@link TransportRequest}.
 *
 * @example
 * ```typescript
 * const description = RequestDescription.post('https://api.example.com/items', {
 *   name: 'widget',
 * }).with({ headers: HeaderSet.of(HttpHeader.accept('application/json')) });
 *
 * const request = description.build();
 * request.headerFields; // { Accept: 'application/json', 'Content-Type': 'application/json' }
 * ```
 */
export class RequestDescription implements MutableRequestable {
  baseURLString: string | undefined;
  headers: HeaderSet;
  method: HttpMethod;
  parameters: Parameters;
  parameterEncoding: ParameterEncoding;
  files: readonly FileParameter[];

  readonly defaultBaseUrl: string;
  readonly encoders: EncoderRegistry;
  readonly multipartBoundary: string;

  constructor(init: RequestDescriptionInit = {}) {
    this.baseURLString = init.baseURLString;
    this.headers = init.headers ?? HeaderSet.empty;
    this.method = init.method ?? HttpMethod.get;
    this.parameters = init.parameters ?? {};
    this.parameterEncoding = init.parameterEncoding ?? ParameterEncoding.json;
    this.files = init.files ?? [];
    this.defaultBaseUrl = init.defaultBaseUrl ?? DEFAULT_BASE_URL;
    this.encoders = init.encoders ?? defaultEncoderRegistry;
    this.multipartBoundary = init.multipartBoundary ?? `----requestable-${uuidv4()}`;
  }

  static get(url: string, parameters?: Parameters): RequestDescription {
    return new RequestDescription({ baseURLString: url, method: HttpMethod.get, parameters });
  }

  static post(url: string, parameters?: Parameters): RequestDescription {
    return new RequestDescription({ baseURLString: url, method: HttpMethod.post, parameters });
  }

  static put(url: string, parameters?: Parameters): RequestDescription {
    return new RequestDescription({ baseURLString: url, method: HttpMethod.put, parameters });
  }

  static patch(url: string, parameters?: Parameters): RequestDescription {
    return new RequestDescription({ baseURLString: url, method: HttpMethod.patch, parameters });
  }

  static delete(url: string, parameters?: Parameters): RequestDescription {
    return new RequestDescription({ baseURLString: url, method: HttpMethod.delete, parameters });
  }

  with(changes: Partial<MutableRequestFields>): RequestDescription {
    return new RequestDescription({
      // An explicit undefined clears the URL; other fields keep their value
      baseURLString: 'baseURLString' in changes ? changes.baseURLString : this.baseURLString,
      headers: changes.headers ?? this.headers,
      method: changes.method ?? this.method,
      parameters: changes.parameters ?? this.parameters,
      parameterEncoding: changes.parameterEncoding ?? this.parameterEncoding,
      files: changes.files ?? this.files,
      defaultBaseUrl: this.defaultBaseUrl,
      encoders: this.encoders,
      multipartBoundary: this.multipartBoundary,
    });
  }

  /**
   * Resolves the description.
   *
   * - The URL is `baseURLString`, or `defaultBaseUrl` when unset, passed
   *   through verbatim once it parses with a scheme and a host.
   * - Headers are flattened last-write-wins per key (see `HeaderSet.toRecord`).
   * - With files, the body is `multipart/form-data` and its Content-Type,
   *   boundary included, replaces any Content-Type header.
   * - Otherwise non-empty parameters are serialized by the codec registered
   *   for `parameterEncoding`, whose token becomes the Content-Type unless the
   *   headers already carry one. Empty parameters send no body.
   *
   * @throws BuildError with kind `InvalidUrl` or `EncodingFailure`
   */
  build(): TransportRequest {
    const url = this.resolveUrl();
    let headers = this.headers;
    let body: Uint8Array | undefined;

    if (this.files.length > 0) {
      const multipart = this.encodeFiles();
      headers = headers
        .removingKey('Content-Type')
        .inserting(HttpHeader.contentType(multipart.contentType));
      body = multipart.body;
    } else if (Object.keys(this.parameters).length > 0) {
      body = this.encodeParameters();
      if (headers.valuesFor('Content-Type').length === 0) {
        headers = headers.inserting(HttpHeader.contentType(this.parameterEncoding.rawValue));
      }
    }

    return new TransportRequest({
      url,
      method: this.method.rawValue,
      headers: headers.toRecord(),
      body,
    });
  }

  private resolveUrl(): string {
    const url = this.baseURLString ?? this.defaultBaseUrl;

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw BuildError.invalidUrl(url, error);
    }

    if (parsed.protocol === '' || parsed.host === '') {
      throw BuildError.invalidUrl(url);
    }
    return url;
  }

  private encodeParameters(): Uint8Array {
    const token = this.parameterEncoding.rawValue;
    const codec = this.encoders.get(this.parameterEncoding);
    if (!codec) {
      throw BuildError.encodingFailure(token, new Error(`No encoder registered for ${token}`));
    }

    try {
      return codec.encode(this.parameters);
    } catch (error) {
      throw BuildError.encodingFailure(token, error);
    }
  }

  private encodeFiles(): { body: Uint8Array; contentType: string } {
    try {
      return encodeMultipart(this.parameters, this.files, this.multipartBoundary);
    } catch (error) {
      throw BuildError.encodingFailure(MULTIPART_FORM_DATA, error);
    }
  }
}
