/**
 * Tests for parameter encoders
 */

import { describe, it, expect } from 'vitest';
import {
  EncoderRegistry,
  decodeJson,
  decodeUrlForm,
  defaultEncoderRegistry,
  encodeJson,
  encodeUrlForm,
} from '../encoders.js';
import { encodeMultipart } from '../multipart.js';
import { ParameterEncoding } from '../../http/encoding.js';
import { createUploadFile } from '../../types/file.js';

const text = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);
const bytes = (value: string): Uint8Array => new TextEncoder().encode(value);

describe('JSON codec', () => {
  it('should encode parameters as a JSON object', () => {
    expect(text(encodeJson({ name: 'widget', count: 2, tags: ['a'], meta: null }))).toBe(
      '{"name":"widget","count":2,"tags":["a"],"meta":null}'
    );
  });

  it('should read an encoded body back', () => {
    const parameters = { name: 'widget', nested: { enabled: true } };

    expect(decodeJson(encodeJson(parameters))).toEqual(parameters);
  });

  it('should reject a JSON array', () => {
    expect(() => decodeJson(bytes('[1,2]'))).toThrow('JSON body is not an object of parameter values');
  });

  it('should reject malformed JSON', () => {
    expect(() => decodeJson(bytes('not json'))).toThrow(SyntaxError);
  });
});

describe('URL form codec', () => {
  it('should flatten nested values with brackets', () => {
    const body = encodeUrlForm({ a: { b: 1 }, list: [1, 2], name: 'a b', empty: null });

    expect(text(body)).toBe('a%5Bb%5D=1&list%5B%5D=1&list%5B%5D=2&name=a+b&empty=');
  });

  it('should encode booleans as text', () => {
    expect(text(encodeUrlForm({ enabled: true }))).toBe('enabled=true');
  });

  it('should decode repeated keys into arrays', () => {
    expect(decodeUrlForm(bytes('x=1&x=2&x=3&y=hello+world'))).toEqual({
      x: ['1', '2', '3'],
      y: 'hello world',
    });
  });
});

describe('URL form codec with built-in object keys', () => {
  it('should read back keys shadowing object members', () => {
    expect(decodeUrlForm(encodeUrlForm({ constructor: 'v', toString: 'w' }))).toEqual({
      constructor: 'v',
      toString: 'w',
    });
  });

  it('should keep a __proto__ key as an own field', () => {
    const parameters = decodeUrlForm(bytes('__proto__=v'));

    expect(Object.keys(parameters)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(parameters, '__proto__')?.value).toBe('v');
    expect(Object.getPrototypeOf(parameters)).toBe(Object.prototype);
  });
});

describe('EncoderRegistry', () => {
  it('should hold the JSON and URL codecs by default', () => {
    expect(defaultEncoderRegistry.has(ParameterEncoding.json)).toBe(true);
    expect(defaultEncoderRegistry.has(ParameterEncoding.url)).toBe(true);
    expect(defaultEncoderRegistry.has(new ParameterEncoding('text/plain'))).toBe(false);
  });

  it('should look codecs up by token', () => {
    const codec = defaultEncoderRegistry.get(new ParameterEncoding('application/json'));

    expect(codec?.encode).toBe(encodeJson);
  });

  it('should register into a copy', () => {
    const plain = new ParameterEncoding('text/plain');
    const base = EncoderRegistry.withDefaults();
    const extended = base.register(plain, { encode: () => bytes('plain') });

    expect(base.has(plain)).toBe(false);
    expect(extended.has(plain)).toBe(true);
    expect(extended.has(ParameterEncoding.json)).toBe(true);
  });
});

describe('encodeMultipart', () => {
  it('should lay out fields and files with the given boundary', () => {
    const file = createUploadFile(bytes('abc'), {
      filename: 'a.txt',
      mimetype: 'text/plain',
      fileData: { caption: 'cap' },
    });

    const result = encodeMultipart({ title: 'hello' }, [['avatar', file]], 'test-boundary');

    expect(result.contentType).toBe('multipart/form-data; boundary=test-boundary');
    expect(text(result.body)).toBe(
      '--test-boundary\r\n' +
        'Content-Disposition: form-data; name="title"\r\n' +
        '\r\n' +
        'hello\r\n' +
        '--test-boundary\r\n' +
        'Content-Disposition: form-data; name="caption"\r\n' +
        '\r\n' +
        'cap\r\n' +
        '--test-boundary\r\n' +
        'Content-Disposition: form-data; name="avatar"; filename="a.txt"\r\n' +
        'Content-Type: text/plain\r\n' +
        '\r\n' +
        'abc\r\n' +
        '--test-boundary--\r\n'
    );
  });

  it('should fall back to the field name and a binary content type', () => {
    const result = encodeMultipart({}, [['upload', createUploadFile(bytes('x'))]], 'form-boundary');

    expect(text(result.body)).toContain(
      'Content-Disposition: form-data; name="upload"; filename="upload"\r\n' +
        'Content-Type: application/octet-stream\r\n'
    );
  });

  it('should send nested values as JSON and null as empty', () => {
    const result = encodeMultipart({ meta: { a: 1 }, gone: null }, [], 'form-boundary');

    expect(text(result.body)).toContain('name="meta"\r\n\r\n{"a":1}\r\n');
    expect(text(result.body)).toContain('name="gone"\r\n\r\n\r\n');
  });
});
