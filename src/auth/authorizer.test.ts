import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { ValidationError } from '../error/validationError.js';
import { isAuthorizer, isRefreshable, RefreshingAuthorizer, StaticAuthorizer } from './authorizer.js';

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(1_000_000);
});

afterEach(() => {
  vi.useRealTimers();
});

describe('isAuthorizer', () => {
  it('accepts both authorizers and structural lookalikes', () => {
    expect(isAuthorizer(new StaticAuthorizer('test-token'))).toBe(true);
    expect(isAuthorizer(new RefreshingAuthorizer({ fetchToken: async () => ({}) }))).toBe(true);
    expect(isAuthorizer({ accessToken: null, isValid: () => false, clearAccessToken: () => {} })).toBe(true);
  });

  it.each([null, undefined, 'test-token', {}, { accessToken: 'x', isValid: true, clearAccessToken: () => {} }])(
    'rejects %s',
    (value) => {
      expect(isAuthorizer(value)).toBe(false);
    },
  );
});

describe('isRefreshable', () => {
  it('detects a refresh operation', () => {
    expect(isRefreshable(new StaticAuthorizer('test-token'))).toBe(false);
    expect(isRefreshable(new RefreshingAuthorizer({ fetchToken: async () => ({}) }))).toBe(true);
  });
});

describe('StaticAuthorizer', () => {
  it('is valid until cleared', () => {
    const authorizer = new StaticAuthorizer('test-token');
    expect(authorizer.accessToken).toBe('test-token');
    expect(authorizer.isValid()).toBe(true);

    authorizer.clearAccessToken();

    expect(authorizer.accessToken).toBeNull();
    expect(authorizer.isValid()).toBe(false);
  });

  it('expires after its lifetime', () => {
    const authorizer = new StaticAuthorizer('test-token', { expiresIn: 60 });
    vi.setSystemTime(1_059_999);
    expect(authorizer.isValid()).toBe(true);

    vi.setSystemTime(1_060_000);
    expect(authorizer.isValid()).toBe(false);
  });
});

describe('RefreshingAuthorizer', () => {
  it('starts without a valid token', () => {
    const authorizer = new RefreshingAuthorizer({ refreshToken: 'test-refresh', fetchToken: async () => ({}) });
    expect(authorizer.accessToken).toBeNull();
    expect(authorizer.isValid()).toBe(false);
  });

  it('stores the grant of a refresh', async () => {
    const fetchToken = vi.fn(async () => ({ access_token: 'test-access', expires_in: 3600, scope: 'read submit' }));
    const authorizer = new RefreshingAuthorizer({ refreshToken: 'test-refresh', fetchToken, scopes: ['identity'] });
    expect([...authorizer.scopes]).toEqual(['identity']);

    const [err] = await authorizer.refresh();

    expect(err).toBeNull();
    expect(fetchToken).toHaveBeenCalledWith('test-refresh');
    expect(authorizer.accessToken).toBe('test-access');
    expect(authorizer.isValid()).toBe(true);
    expect([...authorizer.scopes]).toEqual(['read', 'submit']);
    expect(authorizer.refreshToken).toBe('test-refresh');

    vi.setSystemTime(1_000_000 + 3_600_000);
    expect(authorizer.isValid()).toBe(false);
  });

  it('replaces a rotated refresh token', async () => {
    const authorizer = new RefreshingAuthorizer({
      refreshToken: 'test-refresh',
      fetchToken: async () => ({ access_token: 'test-access', expires_in: 60, refresh_token: 'test-rotated' }),
    });

    await authorizer.refresh();

    expect(authorizer.refreshToken).toBe('test-rotated');
  });

  it('fails with a ConfigurationError without a refresh token', async () => {
    const fetchToken = vi.fn(async () => ({}));
    const authorizer = new RefreshingAuthorizer({ fetchToken });

    const [err] = await authorizer.refresh();

    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err?.message).toBe('refresh token not provided');
    expect(fetchToken).not.toHaveBeenCalled();
  });

  it('fails with a ValidationError on a malformed grant', async () => {
    const authorizer = new RefreshingAuthorizer({
      refreshToken: 'test-refresh',
      fetchToken: async () => ({ access_token: 'test-access' }),
    });

    const [err] = await authorizer.refresh();

    expect(err).toBeInstanceOf(ValidationError);
    if (err instanceof ValidationError) {
      expect(err.fields).toEqual(['expires_in']);
    }
    expect(authorizer.accessToken).toBeNull();
  });

  it('wraps errors from the token fetch', async () => {
    const cause = new Error('endpoint down');
    const authorizer = new RefreshingAuthorizer({
      refreshToken: 'test-refresh',
      fetchToken: async () => {
        throw cause;
      },
    });

    const [err] = await authorizer.refresh();

    expect(err?.message).toBe('error fetching token grant');
    expect(err?.cause).toBe(cause);
  });

  it('shares one in-flight refresh between concurrent callers', async () => {
    const fetchToken = vi.fn(async () => ({ access_token: 'test-access', expires_in: 60 }));
    const authorizer = new RefreshingAuthorizer({ refreshToken: 'test-refresh', fetchToken });

    const [first, second] = await Promise.all([authorizer.refresh(), authorizer.refresh()]);

    expect(first[0]).toBeNull();
    expect(second[0]).toBeNull();
    expect(fetchToken).toHaveBeenCalledTimes(1);

    await authorizer.refresh();
    expect(fetchToken).toHaveBeenCalledTimes(2);
  });

  it('clears the token', async () => {
    const authorizer = new RefreshingAuthorizer({
      refreshToken: 'test-refresh',
      fetchToken: async () => ({ access_token: 'test-access', expires_in: 60 }),
    });
    await authorizer.refresh();

    authorizer.clearAccessToken();

    expect(authorizer.accessToken).toBeNull();
    expect(authorizer.isValid()).toBe(false);
  });
});
