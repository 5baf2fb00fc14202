import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class GrantError extends Error {
  name = 'GrantError';
}

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [null, parsedJson] when JSON.parse succeeds', () => {
    const [err, data] = safeWrap(() => JSON.parse('{"kind":"t2"}'));

    expect(err).toBeNull();
    expect(data).toEqual({ kind: 't2' });
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('<html>'));

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
    const [err, data] = await safeWrapAsync(() => Promise.reject(new GrantError('grant revoked')));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(GrantError);
    expect(err?.message).toBe('grant revoked');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });
});

describe('toError', () => {
  it('returns errors unchanged', () => {
    const err = new GrantError('grant revoked');

    expect(toError(err)).toBe(err);
  });

  it('wraps thrown values that are not errors', () => {
    const [err] = safeWrap(() => {
      throw 'expired';
    });

    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('non-error thrown: expired');
    expect(err?.cause).toBe('expired');
  });
});
