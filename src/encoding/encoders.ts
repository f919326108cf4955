/**
 * Parameter encoders.
 *
 * Each {@link ParameterEncoding} token maps to a codec that serializes a
 * parameter map into body bytes and, where the format allows it, reads those
 * bytes back.
 *
 * @module encoding/encoders
 */

import { ParameterEncoding } from '../http/encoding.js';
import { isParameters } from '../types/parameters.js';
import type { Parameters, ParameterValue } from '../types/parameters.js';

/** Serializes parameters into body bytes. May throw. */
export type ParameterEncoder = (parameters: Parameters) => Uint8Array;

/** Reads body bytes back into parameters. May throw. */
export type ParameterDecoder = (body: Uint8Array) => Parameters;

/**
 * Encoder/decoder pair registered for one encoding.
 */
export interface ParameterCodec {
  encode: ParameterEncoder;
  decode?: ParameterDecoder;
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * Encodes parameters as a UTF-8 JSON object.
 */
export const encodeJson: ParameterEncoder = (parameters) =>
  textEncoder.encode(JSON.stringify(parameters));

/**
 * Decodes a UTF-8 JSON object into parameters.
 *
 * @throws Error if the body is not JSON or not a JSON object of parameter values
 */
export const decodeJson: ParameterDecoder = (body) => {
  const parsed: unknown = JSON.parse(textDecoder.decode(body));
  if (!isParameters(parsed)) {
    throw new Error('JSON body is not an object of parameter values');
  }
  return parsed;
};

/**
 * Flattens a value tree into form pairs using bracket notation:
 * `{ a: { b: 1 } }` becomes `a[b]=1`, `{ a: [1, 2] }` becomes `a[]=1&a[]=2`.
 * `null` is sent as an empty value.
 */
function appendFormValue(form: URLSearchParams, key: string, value: ParameterValue): void {
  if (value === null) {
    form.append(key, '');
  } else if (Array.isArray(value)) {
    for (const item of value) {
      appendFormValue(form, `${key}[]`, item);
    }
  } else if (typeof value === 'object') {
    for (const [childKey, child] of Object.entries(value)) {
      appendFormValue(form, `${key}[${childKey}]`, child);
    }
  } else {
    form.append(key, String(value));
  }
}

/**
 * Encodes parameters as `application/x-www-form-urlencoded`.
 */
export const encodeUrlForm: ParameterEncoder = (parameters) => {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(parameters)) {
    appendFormValue(form, key, value);
  }
  return textEncoder.encode(form.toString());
};

/**
 * Decodes a form body. Values come back as strings; a key that repeats
 * comes back as an array of its values. Bracketed keys are not unflattened.
 */
export const decodeUrlForm: ParameterDecoder = (body) => {
  const values = new Map<string, string | string[]>();
  for (const [key, value] of new URLSearchParams(textDecoder.decode(body))) {
    const existing = values.get(key);
    if (existing === undefined) {
      values.set(key, value);
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      values.set(key, [existing, value]);
    }
  }
  return Object.fromEntries(values);
};

/**
 * Lookup table from encoding token to codec.
 *
 * @example
 * ```typescript
 * const registry = EncoderRegistry.withDefaults().register(
 *   new ParameterEncoding('text/plain'),
 *   { encode: (params) => new TextEncoder().encode(String(params['text'])) }
 * );
 * ```
 */
export class EncoderRegistry {
  private readonly codecs: Map<string, ParameterCodec>;

  constructor(codecs: Iterable<readonly [ParameterEncoding, ParameterCodec]> = []) {
    this.codecs = new Map();
    for (const [encoding, codec] of codecs) {
      this.codecs.set(encoding.hashKey(), codec);
    }
  }

  /**
   * Registry holding the JSON and URL-form codecs.
   */
  static withDefaults(): EncoderRegistry {
    return new EncoderRegistry([
      [ParameterEncoding.json, { encode: encodeJson, decode: decodeJson }],
      [ParameterEncoding.url, { encode: encodeUrlForm, decode: decodeUrlForm }],
    ]);
  }

  /**
   * Returns a copy with `codec` registered for `encoding`.
   */
  register(encoding: ParameterEncoding, codec: ParameterCodec): EncoderRegistry {
    const next = new EncoderRegistry();
    for (const [key, existing] of this.codecs) {
      next.codecs.set(key, existing);
    }
    next.codecs.set(encoding.hashKey(), codec);
    return next;
  }

  get(encoding: ParameterEncoding): ParameterCodec | undefined {
    return this.codecs.get(encoding.hashKey());
  }

  has(encoding: ParameterEncoding): boolean {
    return this.codecs.has(encoding.hashKey());
  }
}

/** Registry used when a description is not given one. */
export const defaultEncoderRegistry = EncoderRegistry.withDefaults();
