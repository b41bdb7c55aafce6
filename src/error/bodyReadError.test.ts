import { describe, expect, it } from 'vitest';
import { BodyReadError, getBodyReadError, isBodyReadError } from './bodyReadError.js';

describe('isBodyReadError', () => {
  it('returns true for instances of BodyReadError', () => {
    expect(isBodyReadError(new BodyReadError('error reading response body'))).toBe(true);
  });

  it('returns false for non BodyReadError errors', () => {
    expect(isBodyReadError(new Error('boom'))).toBe(false);
  });
});

describe('getBodyReadError', () => {
  it('returns the error when passed directly', () => {
    const err = new BodyReadError('error reading response body');
    expect(getBodyReadError(err)).toBe(err);
  });

  it('returns null when no BodyReadError exists', () => {
    expect(getBodyReadError(new Error('outer'))).toBeNull();
  });
});
