/**
 * Request builders and response modifiers.
 *
 * @module modifiers
 */

export type { RequestBuilder } from './request-builder.js';
export {
  applyRequestBuilders,
  requestBuilder,
  HeaderBuilder,
  DefaultHeaderBuilder,
  BearerAuthBuilder,
  BaseUrlBuilder,
} from './request-builder.js';

export type { ResponseModifier } from './response-modifier.js';
export {
  applyResponseModifiers,
  responseModifier,
  LoggingResponseModifier,
  MetricsRecordingModifier,
} from './response-modifier.js';
