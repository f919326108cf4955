/**
 * File payloads for multipart requests.
 *
 * @module types/file
 */

import type { Parameters } from './parameters.js';

/**
 * A file to be uploaded as one part of a multipart form.
 */
export interface UploadFile {
  /** Raw file contents. */
  readonly data: Uint8Array;
  /** Filename reported in the part's Content-Disposition. */
  readonly filename?: string;
  /** MIME type of the part (e.g. `image/png`). */
  readonly mimetype?: string;
  /** Extra form fields sent alongside the file. */
  readonly fileData?: Readonly<Parameters>;
}

/**
 * A form field name paired with the file sent under it.
 */
export type FileParameter = readonly [name: string, file: UploadFile];

/**
 * Creates a frozen {@link UploadFile}.
 *
 * @example
 * ```typescript
 * const avatar = createUploadFile(bytes, {
 *   filename: 'avatar.png',
 *   mimetype: 'image/png',
 * });
 * ```
 */
export function createUploadFile(
  data: Uint8Array,
  options: { filename?: string; mimetype?: string; fileData?: Parameters } = {}
): UploadFile {
  return Object.freeze({
    data,
    filename: options.filename,
    mimetype: options.mimetype,
    fileData: options.fileData ? Object.freeze({ ...options.fileData }) : undefined,
  });
}
