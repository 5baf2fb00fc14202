import { describe, expect, it } from 'vitest';
import { isRedirectError, RedirectError } from './redirectError.js';

const makeResponse = (location?: string) => ({
  status: 302,
  headers: new Headers(location ? { location } : {}),
  url: 'https://oauth.example.com/r/random',
  body: '',
});

describe('RedirectError', () => {
  it('strips a trailing .json from the location', () => {
    const err = new RedirectError(makeResponse('/r/typescript.json'));

    expect(err.path).toBe('/r/typescript');
    expect(err.message).toBe('Redirect to /r/typescript');
  });

  it('adds a hint when redirected to a login page', () => {
    const err = new RedirectError(makeResponse('https://www.example.com/login/'));

    expect(err.message).toBe(
      'Redirect to https://www.example.com/login/ (You may be trying to perform a non-read-only action via a read-only instance.)',
    );
  });

  it('keeps an empty path without a location header', () => {
    const err = new RedirectError(makeResponse());

    expect(err.path).toBe('');
    expect(isRedirectError(err)).toBe(true);
  });
});
