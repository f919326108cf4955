/**
 * Request model.
 *
 * @module request
 */

export type { Requestable, MutableRequestable, MutableRequestFields } from './requestable.js';
export { isMultipartRequest, rawMethod, parameterEncodingOf } from './requestable.js';

export type { TransportRequestInit } from './transport-request.js';
export { TransportRequest } from './transport-request.js';

export type { RequestDescriptionInit } from './description.js';
export { RequestDescription } from './description.js';
