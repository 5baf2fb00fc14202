import { describe, expect, it } from 'vitest';
import { AbortError, isAbortError } from './abortError.js';

describe('isAbortError', () => {
  it('returns true for instances of AbortError', () => {
    const err = new AbortError('requestor closed');
    expect(isAbortError(err)).toBe(true);
  });

  it('returns true when wrapped as a cause', () => {
    const err = new Error('error with request', { cause: new AbortError('requestor closed') });
    expect(isAbortError(err)).toBe(true);
  });

  it('returns false for non-abort errors', () => {
    expect(isAbortError(new Error('boom'))).toBe(false);
  });
});
