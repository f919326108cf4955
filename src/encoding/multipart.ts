/**
 * Multipart form assembly.
 *
 * @module encoding/multipart
 */

import FormData from 'form-data';
import { MULTIPART_FORM_DATA } from '../http/encoding.js';
import type { FileParameter } from '../types/file.js';
import type { Parameters, ParameterValue } from '../types/parameters.js';

/**
 * An assembled multipart body and the Content-Type that announces its boundary.
 */
export interface MultipartBody {
  body: Uint8Array;
  contentType: string;
}

function fieldValue(value: ParameterValue): string {
  if (value === null) {
    return '';
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Builds a `multipart/form-data` body from form fields and files.
 *
 * Scalars are sent as text, nested values as JSON. A file's own `fileData`
 * fields are appended after the fields in `parameters`.
 *
 * @param boundary - Fixed boundary, mostly for reproducible output in tests
 */
export function encodeMultipart(
  parameters: Parameters,
  files: readonly FileParameter[],
  boundary?: string
): MultipartBody {
  const form = new FormData();
  if (boundary !== undefined) {
    form.setBoundary(boundary);
  }

  for (const [key, value] of Object.entries(parameters)) {
    form.append(key, fieldValue(value));
  }

  for (const [name, file] of files) {
    for (const [key, value] of Object.entries(file.fileData ?? {})) {
      form.append(key, fieldValue(value));
    }
    form.append(name, Buffer.from(file.data), {
      filename: file.filename ?? name,
      contentType: file.mimetype ?? 'application/octet-stream',
    });
  }

  return {
    body: new Uint8Array(form.getBuffer()),
    contentType: `${MULTIPART_FORM_DATA}; boundary=${form.getBoundary()}`,
  };
}
