/**
 * Body encoders for parameter maps.
 *
 * @module encoding
 */

export type {
  ParameterEncoder,
  ParameterDecoder,
  ParameterCodec,
} from './encoders.js';
export {
  EncoderRegistry,
  defaultEncoderRegistry,
  encodeJson,
  decodeJson,
  encodeUrlForm,
  decodeUrlForm,
} from './encoders.js';

export type { MultipartBody } from './multipart.js';
export { encodeMultipart } from './multipart.js';
