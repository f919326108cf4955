/**
 * Parameter encoding strategies.
 *
 * @module http/encoding
 */

/**
 * Names the content type used to turn a parameter map into a request body.
 *
 * The token is only an identifier; the serializer behind it is looked up in
 * an {@link EncoderRegistry}. Two encodings are equal when their tokens are.
 */
export class ParameterEncoding {
  static readonly json = new ParameterEncoding('application/json');
  static readonly url = new ParameterEncoding('application/x-www-form-urlencoded');

  constructor(public readonly rawValue: string) {}

  equals(other: ParameterEncoding): boolean {
    return this.rawValue === other.rawValue;
  }

  hashKey(): string {
    return this.rawValue;
  }

  toString(): string {
    return this.rawValue;
  }
}

/** Content type marking a multipart form body. */
export const MULTIPART_FORM_DATA = 'multipart/form-data';
