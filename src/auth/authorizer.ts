import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { createLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

const log = createLogger('auth');

/** Holds the bearer token used on every request. */
export interface Authorizer {
  /** Current bearer token, `null` when absent. */
  readonly accessToken: string | null;
  /** Whether the token is present and unexpired. */
  isValid(): boolean;
  /** Drops the current token, e.g. after the server rejected it. */
  clearAccessToken(): void;
}

/** An {@link Authorizer} that can obtain a new token on its own. */
export interface RefreshableAuthorizer extends Authorizer {
  refresh(): SafeWrapAsync<Error, void>;
}

/**
 * Runtime check that a value satisfies the {@link Authorizer} contract.
 */
export function isAuthorizer(value: unknown): value is Authorizer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'accessToken' in value &&
    (typeof value.accessToken === 'string' || value.accessToken === null) &&
    'isValid' in value &&
    typeof value.isValid === 'function' &&
    'clearAccessToken' in value &&
    typeof value.clearAccessToken === 'function'
  );
}

/**
 * Whether the authorizer can refresh its token.
 */
export function isRefreshable(authorizer: Authorizer): authorizer is RefreshableAuthorizer {
  return 'refresh' in authorizer && typeof authorizer.refresh === 'function';
}

/** Options for {@link StaticAuthorizer} */
export interface StaticAuthorizerOptions {
  /** Token lifetime in seconds; without it the token never expires locally. */
  expiresIn?: number;
}

/**
 * Authorizer for a token obtained elsewhere. Once cleared or expired it stays invalid.
 */
export class StaticAuthorizer implements Authorizer {
  #accessToken: string | null;
  #expiresAt: number | null;

  constructor(accessToken: string, opts?: StaticAuthorizerOptions) {
    this.#accessToken = accessToken;
    this.#expiresAt = opts?.expiresIn === undefined ? null : Date.now() + opts.expiresIn * 1000;
  }

  get accessToken() {
    return this.#accessToken;
  }

  isValid(): boolean {
    return this.#accessToken !== null && (this.#expiresAt === null || Date.now() < this.#expiresAt);
  }

  clearAccessToken(): void {
    this.#accessToken = null;
  }
}

/** Token grant returned by a token endpoint. */
export const TokenGrantSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export type TokenGrant = z.infer<typeof TokenGrantSchema>;

/** Options for {@link RefreshingAuthorizer} */
export interface RefreshingAuthorizerOptions {
  /** Refresh token exchanged for access tokens. */
  refreshToken?: string;
  /**
   * Exchanges a refresh token for a grant. The result is validated against {@link TokenGrantSchema}.
   */
  fetchToken: (refreshToken: string) => Promise<unknown>;
  /** Scopes known up front; replaced by the `scope` of each grant. */
  scopes?: Iterable<string>;
}

/**
 * Authorizer that exchanges a refresh token for short-lived access tokens.
 *
 * Concurrent calls to {@link RefreshingAuthorizer.refresh} share one in-flight grant.
 *
 * @example
 * ```ts
 * const authorizer = new RefreshingAuthorizer({
 *   refreshToken,
 *   fetchToken: (token) => tokenEndpoint.exchange(token),
 * });
 * const [err] = await authorizer.refresh();
 * ```
 */
export class RefreshingAuthorizer implements RefreshableAuthorizer {
  #accessToken: string | null = null;
  #expiresAt: number | null = null;
  #refreshToken: string | null;
  #scopes: Set<string>;
  #fetchToken: (refreshToken: string) => Promise<unknown>;
  #pending: SafeWrapAsync<Error, void> | null = null;

  constructor(opts: RefreshingAuthorizerOptions) {
    this.#refreshToken = opts.refreshToken ?? null;
    this.#fetchToken = opts.fetchToken;
    this.#scopes = new Set(opts.scopes);
  }

  get accessToken() {
    return this.#accessToken;
  }

  get refreshToken() {
    return this.#refreshToken;
  }

  /** Scopes granted to the current token. */
  get scopes(): ReadonlySet<string> {
    return this.#scopes;
  }

  isValid(): boolean {
    return this.#accessToken !== null && this.#expiresAt !== null && Date.now() < this.#expiresAt;
  }

  clearAccessToken(): void {
    this.#accessToken = null;
    this.#expiresAt = null;
  }

  /**
   * Obtains a new access token.
   */
  refresh(): SafeWrapAsync<Error, void> {
    if (this.#pending === null) {
      this.#pending = this.#refresh().finally(() => {
        this.#pending = null;
      });
    }

    return this.#pending;
  }

  async #refresh(): SafeWrapAsync<Error, void> {
    const refreshToken = this.#refreshToken;
    if (refreshToken === null) {
      return [new ConfigurationError('refresh token not provided'), null];
    }

    log.debug('refreshing access token');
    const [errFetch, payload] = await safeWrapAsync(() => this.#fetchToken(refreshToken));
    if (errFetch) {
      return [new Error('error fetching token grant', { cause: errFetch }), null];
    }

    const [errGrant, grant] = await validator(payload, TokenGrantSchema);
    if (errGrant) {
      log.warn({ fields: errGrant.fields }, 'token grant rejected');
      return [errGrant, null];
    }

    this.#accessToken = grant.access_token;
    this.#expiresAt = Date.now() + grant.expires_in * 1000;
    if (grant.refresh_token !== undefined) {
      this.#refreshToken = grant.refresh_token;
    }
    if (grant.scope !== undefined) {
      this.#scopes = new Set(grant.scope.split(' ').filter(Boolean));
    }

    return [null, undefined];
  }
}
