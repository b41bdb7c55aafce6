import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

describe('toError', () => {
  it('returns errors unchanged', () => {
    const err = new TypeError('Invalid URL');
    expect(toError(err)).toBe(err);
  });

  it('uses a thrown string as message', () => {
    const err = toError('closed by caller');
    expect(err.message).toBe('closed by caller');
    expect(err.cause).toBe('closed by caller');
  });

  it('keeps other thrown values as cause', () => {
    const thrown = { code: 42 };
    const err = toError(thrown);
    expect(err.message).toBe('non-error value thrown');
    expect(err.cause).toBe(thrown);
  });
});

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => JSON.parse('{"message":"hi"}'));

    expect(err).toBeNull();
    expect(data).toEqual({ message: 'hi' });
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('{ message: '));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('connection refused')));

    expect(data).toBeNull();
    expect(err?.message).toBe('connection refused');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('normalizes rejected non-error values', async () => {
    const [err] = await safeWrapAsync(() => Promise.reject('aborted'));

    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('aborted');
  });
});
