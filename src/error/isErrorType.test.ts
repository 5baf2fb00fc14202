import { describe, expect, it } from 'vitest';
import { isErrorType } from './isErrorType.js';
import { RequestError } from './requestError.js';
import { ConnectionError, ReadTimeoutError } from './transportError.js';

class RefreshFailedError extends Error {}

class UnrelatedError extends Error {}

describe('isErrorType', () => {
  it('non-error correctly returns false', () => {
    expect(isErrorType(RefreshFailedError, { message: 'not an error' })).toEqual(false);
  });

  it('expect shallow to correctly return true', () => {
    expect(isErrorType(RefreshFailedError, new RefreshFailedError('grant revoked'))).toEqual(true);
  });

  it('expect a transport fault inside a RequestError to be found', () => {
    const err = new RequestError(new ConnectionError('socket hang up'), 'GET', 'https://oauth.example.com/me');

    expect(isErrorType(ConnectionError, err)).toEqual(true);
    expect(isErrorType(ReadTimeoutError, err)).toEqual(false);
  });

  it('expect 5 layers deep to correctly return true', () => {
    let err: Error = new RefreshFailedError('grant revoked');
    for (let layer = 1; layer <= 5; layer += 1) {
      err = new Error(`layer ${layer}`, { cause: err });
    }

    expect(isErrorType(RefreshFailedError, err)).toEqual(true);
  });

  it('expect false on wrapped different error', () => {
    const err = new UnrelatedError('outer', { cause: new Error('inner') });

    expect(isErrorType(RefreshFailedError, err)).toEqual(false);
  });

  it('returns true when error name matches errorClass name even if not instanceof', () => {
    const err = new UnrelatedError('boom');
    Object.defineProperty(err, 'name', { value: RefreshFailedError.name });

    expect(err).not.toBeInstanceOf(RefreshFailedError);
    expect(isErrorType(RefreshFailedError, err)).toBe(true);
  });
});
