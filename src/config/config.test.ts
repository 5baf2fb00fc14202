import { describe, expect, it } from 'vitest';
import { ValidationError } from '../error/validationError.js';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', async () => {
    const [err, config] = await loadConfig({
      BEARERCORE_OAUTH_URL: 'https://oauth.test',
      BEARERCORE_USER_AGENT: 'test-app/1.0',
    });

    expect(err).toBeNull();
    expect(config).toEqual({
      oauthUrl: 'https://oauth.test',
      userAgent: 'test-app/1.0',
      timeout: 16000,
      retries: 3,
    });
  });

  it('parses numeric settings', async () => {
    const [, config] = await loadConfig({
      BEARERCORE_OAUTH_URL: 'https://oauth.test',
      BEARERCORE_USER_AGENT: 'test-app/1.0',
      BEARERCORE_TIMEOUT: '2500',
      BEARERCORE_RETRIES: '5',
    });

    expect(config?.timeout).toBe(2500);
    expect(config?.retries).toBe(5);
  });

  it('rejects a missing url and a short user agent', async () => {
    const [err, config] = await loadConfig({ BEARERCORE_USER_AGENT: 'bot' });

    expect(config).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.fields).toEqual(['BEARERCORE_OAUTH_URL', 'BEARERCORE_USER_AGENT']);
  });

  it('rejects a non-positive retry count', async () => {
    const [err] = await loadConfig({
      BEARERCORE_OAUTH_URL: 'https://oauth.test',
      BEARERCORE_USER_AGENT: 'test-app/1.0',
      BEARERCORE_RETRIES: '0',
    });

    expect(err).toBeInstanceOf(ValidationError);
  });
});
