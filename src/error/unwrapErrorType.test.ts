import { describe, expect, it } from 'vitest';
import { BodyReadError } from './bodyReadError.js';
import { DecodeError } from './decodeError.js';
import { unwrapErrorType } from './unwrapErrorType.js';
import { ValidationError } from './validationError.js';

class TargetError extends Error {}

class OtherError extends Error {}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(DecodeError, { foo: 'bar' })).toEqual(null);
    expect(unwrapErrorType(DecodeError, 'DecodeError')).toEqual(null);
  });

  it('unwrap simplest layer', () => {
    const err = new DecodeError('error decoding JSON result', 'json');

    expect(unwrapErrorType(DecodeError, err)).toBe(err);
  });

  it('unwraps a validation failure behind a decode failure', () => {
    const validation = new ValidationError('error validating data', []);
    const err = new DecodeError('error decoding JSON result', 'json', { cause: validation });

    expect(unwrapErrorType(ValidationError, err)).toBe(validation);
  });

  it('returns null when the chain holds a different error', () => {
    const err = new BodyReadError('error reading response body', { cause: new Error('socket hang up') });

    expect(unwrapErrorType(DecodeError, err)).toEqual(null);
  });

  it('returns error when name matches errorClass name even if not instanceof', () => {
    const err = new OtherError('boom');

    expect(err).not.toBeInstanceOf(TargetError);
    Object.defineProperty(err, 'name', { value: TargetError.name });

    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });
});
