import { describe, expect, it } from 'vitest';
import { DecodeError } from '../error/decodeError.js';
import { EncodeError } from '../error/encodeError.js';
import { decodeJSON, encodeJSON } from './json.js';

const bytes = (text: string) => new TextEncoder().encode(text);

describe('encodeJSON', () => {
  it('serializes without a trailing newline', () => {
    expect(encodeJSON({ message: 'hi' })).toEqual([null, '{"message":"hi"}']);
  });

  it('round-trips nested structures', () => {
    const value = { user: { name: 'test-user', roles: ['admin', 'viewer'], active: true }, count: 3, note: null };
    const [err, text] = encodeJSON(value);

    expect(err).toBeNull();
    expect(JSON.parse(text ?? '')).toEqual(value);
  });

  it('fails for undefined', () => {
    const [err, text] = encodeJSON(undefined);

    expect(text).toBeNull();
    expect(err).toBeInstanceOf(EncodeError);
    expect(err?.message).toBe('error encoding JSON body, undefined is not serializable');
  });

  it('fails for cyclic values and keeps the cause', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    const [err] = encodeJSON(cyclic);
    expect(err?.message).toBe('error encoding JSON body');
    expect(err?.format).toBe('json');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });
});

describe('decodeJSON', () => {
  it('parses UTF-8 JSON', () => {
    expect(decodeJSON(bytes('{"message":"hæ"}'))).toEqual([null, { message: 'hæ' }]);
  });

  it('fails on malformed input', () => {
    const [err, value] = decodeJSON(bytes('{"message":'));

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(DecodeError);
    expect(err?.message).toBe('error decoding JSON result');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });
});
