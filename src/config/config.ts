import { z } from 'zod';
import { DEFAULT_TIMEOUT } from '../const.js';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Environment variables read by {@link loadConfig}. */
export const EnvSchema = z.object({
  BEARERCORE_OAUTH_URL: z.string().url(),
  BEARERCORE_USER_AGENT: z.string().min(7),
  BEARERCORE_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  BEARERCORE_RETRIES: z.coerce.number().int().positive().default(3),
});

/** Settings needed to build a session. */
export interface ClientConfig {
  /** Base URL of the authenticated API */
  oauthUrl: string;
  /** Application description sent as User-Agent */
  userAgent: string;
  /** Per-attempt timeout in milliseconds */
  timeout: number;
  /** Attempts per request */
  retries: number;
}

/**
 * Reads the client configuration from environment variables.
 *
 * @example
 * ```ts
 * const [err, config] = await loadConfig();
 * if (err) {
 *   console.error(err.issues);
 * }
 * ```
 */
export async function loadConfig(
  env: Record<string, string | undefined> = process.env,
): SafeWrapAsync<ValidationError, ClientConfig> {
  const [err, parsed] = await validator(env, EnvSchema);
  if (err) {
    return [err, null];
  }

  return [
    null,
    {
      oauthUrl: parsed.BEARERCORE_OAUTH_URL,
      userAgent: parsed.BEARERCORE_USER_AGENT,
      timeout: parsed.BEARERCORE_TIMEOUT,
      retries: parsed.BEARERCORE_RETRIES,
    },
  ];
}
