/**
 * HTTP vocabulary: methods, headers and parameter encodings.
 *
 * @module http
 */

export { HttpMethod } from './method.js';
export { HttpHeader } from './header.js';
export { HeaderSet } from './headers.js';
export { ParameterEncoding, MULTIPART_FORM_DATA } from './encoding.js';
