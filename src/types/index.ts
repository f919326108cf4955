/**
 * Shared payload types.
 *
 * @module types
 */

export type { ParameterValue, Parameters } from './parameters.js';
export { ParameterValueSchema, ParametersSchema, isParameters } from './parameters.js';

export type { UploadFile, FileParameter } from './file.js';
export { createUploadFile } from './file.js';

export type {
  ResponseMetadata,
  DataResponse,
  DownloadResponse,
  UploadResponse,
} from './responses.js';
