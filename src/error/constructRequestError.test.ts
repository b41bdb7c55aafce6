import { describe, expect, it } from 'vitest';
import { ConstructRequestError, getConstructRequestError, isConstructRequestError } from './constructRequestError.js';

describe('ConstructRequestError', () => {
  it('exposes method and url via getters', () => {
    const err = new ConstructRequestError('bad url', 'POST', 'not a url');
    expect(err.method).toBe('POST');
    expect(err.url).toBe('not a url');
  });
});

describe('isConstructRequestError', () => {
  it('returns true for instances of ConstructRequestError', () => {
    const err = new ConstructRequestError('bad url', 'GET', '/relative');
    expect(isConstructRequestError(err)).toBe(true);
  });

  it('returns false for non ConstructRequestError errors', () => {
    expect(isConstructRequestError(new Error('boom'))).toBe(false);
  });
});

describe('getConstructRequestError', () => {
  it('returns the error when passed directly', () => {
    const err = new ConstructRequestError('bad url', 'GET', '/relative');
    expect(getConstructRequestError(err)).toBe(err);
  });

  it('unwraps nested causes', () => {
    const err = new ConstructRequestError('bad url', 'GET', '/relative');
    const wrapped = new Error('outer', { cause: err });
    expect(getConstructRequestError(wrapped)).toBe(err);
  });

  it('returns null when no ConstructRequestError exists', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });
    expect(getConstructRequestError(wrapped)).toBeNull();
  });
});
