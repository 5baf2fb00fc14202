import { describe, expect, it } from 'vitest';
import { isTooManyRequestsError, parseRetryAfter, TooManyRequestsError } from './tooManyRequestsError.js';

describe('parseRetryAfter', () => {
  it('reads a delay in seconds', () => {
    expect(parseRetryAfter('30')).toBe(30);
  });

  it('reads an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');

    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:45 GMT', now)).toBe(45);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', now)).toBe(0);
  });

  it('returns null for a missing or unreadable header', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });
});

describe('TooManyRequestsError', () => {
  it('exposes retryAfter from the response', () => {
    const err = new TooManyRequestsError({
      status: 429,
      headers: new Headers({ 'retry-after': '12' }),
      url: 'https://oauth.example.com/api/v1/me',
      body: '',
    });

    expect(err.retryAfter).toBe(12);
    expect(err.message).toBe('received 429 HTTP response');
    expect(isTooManyRequestsError(err)).toBe(true);
  });
});
