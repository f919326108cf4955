/**
 * Request description contracts.
 *
 * @module request/requestable
 */

import { MULTIPART_FORM_DATA, ParameterEncoding } from '../http/encoding.js';
import type { HeaderSet } from '../http/headers.js';
import type { HttpMethod } from '../http/method.js';
import type { FileParameter } from '../types/file.js';
import type { Parameters } from '../types/parameters.js';
import type { TransportRequest } from './transport-request.js';

/**
 * Anything that can describe an HTTP request and resolve it into a
 * transport-ready {@link TransportRequest}.
 */
export interface Requestable {
  readonly headers: HeaderSet;
  readonly method: HttpMethod;
  readonly parameters: Parameters;
  /** Falls back to JSON when omitted; read it through {@link parameterEncodingOf}. */
  readonly parameterEncoding?: ParameterEncoding;

  /**
   * Resolves the description into a transport-ready request.
   *
   * Calling it twice without changing the description yields equivalent
   * requests.
   *
   * @throws BuildError if the description cannot be resolved
   */
  build(): TransportRequest;
}

/**
 * Fields of a {@link MutableRequestable} that can be replaced in one step.
 */
export interface MutableRequestFields {
  baseURLString: string | undefined;
  headers: HeaderSet;
  method: HttpMethod;
  parameters: Parameters;
  parameterEncoding: ParameterEncoding;
  files: readonly FileParameter[];
}

/**
 * A request description whose fields may be set after construction.
 *
 * Request builders only ever see this contract. They must leave the instance
 * they receive untouched and return a copy made through {@link with}.
 */
export interface MutableRequestable extends Requestable {
  /** Target URL; the build falls back to a default when unset. */
  baseURLString: string | undefined;
  headers: HeaderSet;
  method: HttpMethod;
  parameters: Parameters;
  parameterEncoding: ParameterEncoding;
  /** Files sent as a multipart body. */
  files: readonly FileParameter[];

  /**
   * Returns a copy with `changes` applied. The receiver is not modified.
   */
  with(changes: Partial<MutableRequestFields>): MutableRequestable;
}

/**
 * True when some header is a Content-Type (key compared case-insensitively)
 * whose value contains `multipart/form-data`, also case-insensitively.
 */
export function isMultipartRequest(request: Pick<Requestable, 'headers'>): boolean {
  return request.headers
    .valuesFor('Content-Type')
    .some((value) => value.toLowerCase().includes(MULTIPART_FORM_DATA));
}

/**
 * The method token of a request.
 */
export function rawMethod(request: Pick<Requestable, 'method'>): string {
  return request.method.rawValue;
}

/**
 * The encoding a request asks for, JSON when it names none.
 */
export function parameterEncodingOf(request: Pick<Requestable, 'parameterEncoding'>): ParameterEncoding {
  return request.parameterEncoding ?? ParameterEncoding.json;
}
