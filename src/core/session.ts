import { type Authorizer, isAuthorizer, isRefreshable } from '../auth/authorizer.js';
import type { ClientConfig } from '../config/config.js';
import { authorizationError } from '../error/authorizationError.js';
import { ConfigurationError } from '../error/configurationError.js';
import { RedirectError } from '../error/redirectError.js';
import { isRequestError } from '../error/requestError.js';
import {
  BadRequestError,
  ConflictError,
  MalformedPayloadError,
  NotFoundError,
  type ResponseError,
  ServerError,
  TooLargeError,
  UnavailableForLegalReasonsError,
  URITooLongError,
} from '../error/responseError.js';
import { SpecialError } from '../error/specialError.js';
import { TooManyRequestsError } from '../error/tooManyRequestsError.js';
import { isTransientTransportError } from '../error/transportError.js';
import { UnexpectedStatusError } from '../error/unexpectedStatusError.js';
import { type HeaderCallback, RateLimiter, type RateLimiterDefinition } from '../rateLimit/limiter.js';
import { Requestor } from '../requestor/client.js';
import { FiniteRetryStrategy, type RetryStrategy, type RetryStrategyFactory } from '../retry/strategy.js';
import type {
  FormPairs,
  HttpMethod,
  JsonValue,
  RawBody,
  RequestorDefinition,
  TransportRequestFn,
  TransportResponse,
} from '../types/request.js';
import { createLogger } from '../utils/logger.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import type { FormMapping, JsonObject, RequestDescriptor, RequestParams, RequestResult, SessionProps } from './types.js';

const log = createLogger('session');

/** Builds the error for a response status. */
type StatusErrorFactory = (response: TransportResponse) => ResponseError;

function isRawBody(data: FormMapping | RawBody): data is RawBody {
  return typeof data === 'string' || data instanceof Blob || data instanceof ArrayBuffer;
}

function isJsonObject(json: JsonValue): json is JsonObject {
  return typeof json === 'object' && json !== null && !Array.isArray(json);
}

function compareKeys([a]: readonly [string, unknown], [b]: readonly [string, unknown]): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * The low-level connection to an OAuth-protected REST API.
 *
 * Every call is authorized with the current bearer token, paced by the rate
 * limiter and retried on transient failures. Statuses map onto the error
 * taxonomy; successful bodies are decoded as JSON.
 *
 * @example
 * ```ts
 * const session = new Session({ authorizer, requestor });
 * const [err, me] = await session.request('GET', '/api/v1/me');
 * ```
 */
export class Session {
  /** Statuses with a dedicated error. */
  static readonly STATUS_ERRORS: ReadonlyMap<number, StatusErrorFactory> = new Map<number, StatusErrorFactory>([
    [301, (response) => new RedirectError(response)],
    [302, (response) => new RedirectError(response)],
    [400, (response) => new BadRequestError(response)],
    [401, authorizationError],
    [403, authorizationError],
    [404, (response) => new NotFoundError(response)],
    [409, (response) => new ConflictError(response)],
    [413, (response) => new TooLargeError(response)],
    [414, (response) => new URITooLongError(response)],
    [415, (response) => new SpecialError(response)],
    [420, (response) => new TooManyRequestsError(response)],
    [429, (response) => new TooManyRequestsError(response)],
    [451, (response) => new UnavailableForLegalReasonsError(response)],
    [500, (response) => new ServerError(response)],
    [502, (response) => new ServerError(response)],
    [503, (response) => new ServerError(response)],
    [504, (response) => new ServerError(response)],
    [520, (response) => new ServerError(response)],
    [522, (response) => new ServerError(response)],
  ]);

  /** Statuses worth another attempt. */
  static readonly RETRY_STATUSES: ReadonlySet<number> = new Set([408, 500, 502, 503, 504, 520, 522]);

  /** Statuses whose body is decoded. */
  static readonly SUCCESS_STATUSES: ReadonlySet<number> = new Set([200, 201, 202]);

  #authorizer: Authorizer;
  #requestor: RequestorDefinition;
  #rateLimiter: RateLimiterDefinition;
  #retryStrategy: RetryStrategyFactory;

  /**
   * @throws {ConfigurationError} When `authorizer` is not an {@link Authorizer}.
   */
  constructor({
    authorizer,
    requestor,
    rateLimiter = new RateLimiter(),
    retryStrategy = () => new FiniteRetryStrategy(),
  }: SessionProps) {
    if (!isAuthorizer(authorizer)) {
      throw new ConfigurationError(`invalid authorizer: ${String(authorizer)}`);
    }

    this.#authorizer = authorizer;
    this.#requestor = requestor;
    this.#rateLimiter = rateLimiter;
    this.#retryStrategy = retryStrategy;
  }

  /**
   * Returns the decoded body of the resource at `path`.
   *
   * Refreshes the access token first when it is invalid and the authorizer can refresh.
   *
   * @param method - HTTP method.
   * @param path - Path resolved against the requestor's `oauthUrl`.
   * @param opts - Body, files, query parameters and timeout.
   * @returns A promise resolving to `[error, result]`.
   */
  async request(method: HttpMethod, path: string, opts: RequestParams = {}): SafeWrapAsync<Error, RequestResult> {
    const [errDescribe, descriptor] = safeWrap(() => this.#describe(method, path, opts));
    if (errDescribe) {
      return [new ConfigurationError(`error resolving request path ${path}`, { cause: errDescribe }), null];
    }

    return this.#requestWithRetries(descriptor, this.#retryStrategy());
  }

  /**
   * Closes the requestor.
   */
  close(): void {
    this.#requestor.close();
  }

  /**
   * Normalizes caller values into a frozen descriptor without touching them.
   * The JSON body is deep-copied so later changes by the caller never reach a retry.
   */
  #describe(method: HttpMethod, path: string, opts: RequestParams): RequestDescriptor {
    let data: FormPairs | RawBody | undefined;
    if (opts.data !== undefined) {
      data = isRawBody(opts.data)
        ? opts.data
        : Object.freeze(
            Object.entries({ ...opts.data, api_type: 'json' })
              .sort(compareKeys)
              .map((pair) => Object.freeze(pair)),
          );
    }

    const copy = opts.json === undefined ? undefined : structuredClone(opts.json);
    const json = copy !== undefined && isJsonObject(copy) ? { ...copy, api_type: 'json' } : copy;

    return Object.freeze({
      method,
      url: new URL(path, this.#requestor.oauthUrl).href,
      params: Object.freeze({ ...opts.params, raw_json: 1 }),
      data,
      files: opts.files,
      json,
      timeout: opts.timeout,
    });
  }

  async #requestWithRetries(descriptor: RequestDescriptor, initial: RetryStrategy): SafeWrapAsync<Error, RequestResult> {
    const { method, url } = descriptor;
    let state = initial;

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        await state.sleep();
      }

      log.debug({ method, url, data: descriptor.data, params: descriptor.params }, 'fetching');
      const [err, response] = await this.#rateLimiter.call(this.#send, this.#headerCallback, method, url, {
        allowRedirects: false,
        data: descriptor.data,
        files: descriptor.files,
        json: descriptor.json,
        params: descriptor.params,
        timeout: descriptor.timeout,
      });

      if (err) {
        if (!state.shouldRetryOnFailure() || !this.#isTransient(err)) {
          return [err, null];
        }

        log.warn({ method, url, err }, 'retrying');
        state = state.consumeAvailableRetry();
        continue;
      }

      log.debug({ status: response.status, contentLength: response.headers.get('content-length') }, 'response');

      let retryUnauthorized = false;
      if (response.status === 401) {
        this.#authorizer.clearAccessToken();
        retryUnauthorized = isRefreshable(this.#authorizer);
      }

      if (state.shouldRetryOnFailure() && (retryUnauthorized || Session.RETRY_STATUSES.has(response.status))) {
        log.warn({ method, url, status: response.status }, 'retrying');
        state = state.consumeAvailableRetry();
        continue;
      }

      return this.#complete(response);
    }
  }

  /**
   * Maps a final response onto its result or error.
   */
  #complete(response: TransportResponse): SafeWrap<Error, RequestResult> {
    const statusError = Session.STATUS_ERRORS.get(response.status);
    if (statusError) {
      return [statusError(response), null];
    }

    if (response.status === 204) {
      return [null, null];
    }

    if (!Session.SUCCESS_STATUSES.has(response.status)) {
      return [new UnexpectedStatusError(response), null];
    }

    if (response.headers.get('content-length') === '0') {
      return [null, ''];
    }

    const [errParse, payload] = safeWrap((): JsonValue => JSON.parse(response.body));
    if (errParse) {
      return [new MalformedPayloadError(response, undefined, { cause: errParse }), null];
    }

    return [null, payload];
  }

  /** Whether a transport failure is worth another attempt. */
  #isTransient(error: Error): boolean {
    return isRequestError(error) && isTransientTransportError(error.originalError);
  }

  #send: TransportRequestFn = (method, url, opts) => this.#requestor.request(method, url, opts);

  #headerCallback: HeaderCallback = async () => {
    if (!this.#authorizer.isValid() && isRefreshable(this.#authorizer)) {
      const [err] = await this.#authorizer.refresh();
      if (err) {
        return [err, null];
      }
    }

    return [null, { Authorization: `bearer ${this.#authorizer.accessToken}` }];
  };
}

/** Options for {@link createSession}. */
export interface CreateSessionProps {
  /** Source of the bearer token. */
  authorizer: Authorizer;
  /** Client settings, e.g. from `loadConfig`. */
  config: ClientConfig;
  /** Paces calls. Defaults to a fresh {@link RateLimiter}. */
  rateLimiter?: RateLimiterDefinition;
}

/**
 * Builds a {@link Requestor} and a {@link Session} from client settings.
 *
 * @returns `[ConfigurationError, null]` when the wiring is invalid.
 */
export function createSession({ authorizer, config, rateLimiter }: CreateSessionProps): SafeWrap<Error, Session> {
  return safeWrap(() => {
    const requestor = new Requestor(config.userAgent, { oauthUrl: config.oauthUrl, timeout: config.timeout });
    return new Session({
      authorizer,
      requestor,
      rateLimiter,
      retryStrategy: () => new FiniteRetryStrategy(config.retries),
    });
  });
}
