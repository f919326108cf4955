/**
 * requestable
 *
 * Transport-agnostic HTTP request descriptions, composable request builders
 * and response modifiers, and timed execution.
 *
 * @example
 * ```typescript
 * import {
 *   RequestPipeline,
 *   RequestDescription,
 *   BearerAuthBuilder,
 *   HttpMethod,
 * } from 'requestable';
 *
 * const pipeline = RequestPipeline.withDefaults({
 *   builders: [new BearerAuthBuilder('test-token')],
 * });
 *
 * const response = await pipeline.send(
 *   RequestDescription.post('https://api.example.com/items', { name: 'widget' })
 * );
 *
 * console.log(response.result.urlResponse.statusCode, response.metrics.duration);
 * ```
 */

// HTTP vocabulary
export { HttpMethod, HttpHeader, HeaderSet, ParameterEncoding, MULTIPART_FORM_DATA } from './http/index.js';

// Payload types
export type {
  ParameterValue,
  Parameters,
  UploadFile,
  FileParameter,
  ResponseMetadata,
  DataResponse,
  DownloadResponse,
  UploadResponse,
} from './types/index.js';
export { ParameterValueSchema, ParametersSchema, isParameters, createUploadFile } from './types/index.js';

// Encoding
export type { ParameterEncoder, ParameterDecoder, ParameterCodec, MultipartBody } from './encoding/index.js';
export {
  EncoderRegistry,
  defaultEncoderRegistry,
  encodeJson,
  decodeJson,
  encodeUrlForm,
  decodeUrlForm,
  encodeMultipart,
} from './encoding/index.js';

// Request model
export type {
  Requestable,
  MutableRequestable,
  MutableRequestFields,
  TransportRequestInit,
  RequestDescriptionInit,
} from './request/index.js';
export {
  isMultipartRequest,
  rawMethod,
  parameterEncodingOf,
  TransportRequest,
  RequestDescription,
} from './request/index.js';

// Modifiers
export type { RequestBuilder, ResponseModifier } from './modifiers/index.js';
export {
  applyRequestBuilders,
  requestBuilder,
  HeaderBuilder,
  DefaultHeaderBuilder,
  BearerAuthBuilder,
  BaseUrlBuilder,
  applyResponseModifiers,
  responseModifier,
  LoggingResponseModifier,
  MetricsRecordingModifier,
} from './modifiers/index.js';

// Execution
export type { ResponseFields, RequestLoader } from './execution/index.js';
export { Metrics, Response, loadResponse } from './execution/index.js';

// Transport
export type { UndiciRequestLoaderOptions } from './transport/index.js';
export { UndiciRequestLoader, createDefaultLoader } from './transport/index.js';

// Pipeline
export type { RequestPipelineOptions } from './client/index.js';
export { RequestPipeline } from './client/index.js';

// Config
export type { PipelineConfig } from './config/index.js';
export {
  PipelineConfigSchema,
  createDefaultConfig,
  createConfig,
  validateConfig,
  configFromEnv,
  ENV_VARS,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
  VERSION,
} from './config/index.js';

// Errors
export {
  BuildError,
  BuildErrorKind,
  TransportError,
  TransportErrorCode,
  ConfigurationError,
  isBuildError,
  isTransportError,
} from './errors/index.js';

// Observability
export type {
  Logger,
  LogEntry,
  LogConfig,
  LogSink,
  MetricsCollector,
  RequestMetrics,
  AggregatedMetrics,
} from './observability/index.js';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  DEFAULT_LOG_CONFIG,
  createLogger,
  createNoopLogger,
  DefaultMetricsCollector,
  Timer,
  createMetricsCollector,
} from './observability/index.js';

// Mocks
export type { RecordedRequest, MockResult } from './mocks/index.js';
export { MockRequestLoader, createMockLoader, dataResponse } from './mocks/index.js';
