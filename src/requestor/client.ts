import { DEFAULT_TIMEOUT, VERSION } from '../const.js';
import { AbortError } from '../error/abortError.js';
import { ConfigurationError } from '../error/configurationError.js';
import { RequestError } from '../error/requestError.js';
import type {
  HttpMethod,
  RequestorDefinition,
  TransportRequestOptions,
  TransportResponse,
} from '../types/request.js';
import { createLogger } from '../utils/logger.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { buildUrl, encodeBody, mergeHeaderOptions, toTransportError } from './utils.js';

const log = createLogger('requestor');

/** Options to configure the {@link Requestor}. */
export interface RequestorOptions {
  /** Base URL that request paths are resolved against. */
  oauthUrl: string;
  /**
   * Default per-call timeout in milliseconds.
   * @default 16000
   */
  timeout?: number;
}

/**
 * Thin wrapper around the native `fetch` API that:
 * - sends a descriptive User-Agent on every call,
 * - encodes query parameters and bodies,
 * - reads the whole body before returning,
 * - returns error-first tuples, every failure as a {@link RequestError}.
 */
export class Requestor implements RequestorDefinition {
  /** Value of the User-Agent header. */
  #userAgent: string;
  #oauthUrl: string;
  #timeout: number;
  /** Aborts every call in flight once closed. */
  #controller = new AbortController();

  /**
   * Creates a requestor.
   *
   * @param userAgent - Describes the application; at least 7 characters.
   * @throws {ConfigurationError} When the user agent is too short.
   */
  constructor(userAgent: string, opts: RequestorOptions) {
    if (userAgent.length < 7) {
      throw new ConfigurationError('user agent is not descriptive');
    }

    this.#userAgent = `${userAgent} bearercore/${VERSION}`;
    this.#oauthUrl = opts.oauthUrl;
    this.#timeout = opts.timeout ?? DEFAULT_TIMEOUT;
  }

  get oauthUrl() {
    return this.#oauthUrl;
  }

  get userAgent() {
    return this.#userAgent;
  }

  /** Whether {@link Requestor.close} was called. */
  get closed() {
    return this.#controller.signal.aborted;
  }

  /**
   * Performs one network call.
   *
   * @param method - HTTP method.
   * @param url - Absolute URL.
   * @param opts - Headers, query parameters, body and timeout of the call.
   * @returns A promise resolving to `[error, response]`.
   */
  async request(
    method: HttpMethod,
    url: string,
    opts: TransportRequestOptions = {},
  ): SafeWrapAsync<Error, TransportResponse> {
    if (this.closed) {
      return [new RequestError(new AbortError('error requestor is closed'), method, url), null];
    }

    const [errUrl, target] = safeWrap(() => buildUrl(url, opts.params));
    if (errUrl) {
      return [new RequestError(errUrl, method, url), null];
    }

    const { body, contentType } = encodeBody(opts);
    const headers = mergeHeaderOptions(
      { 'User-Agent': this.#userAgent, ...(contentType !== undefined && { 'Content-Type': contentType }) },
      opts.headers,
    );
    const settled = new AbortController();
    const timeoutSignal = createTimeoutSignal(opts.timeout ?? this.#timeout, settled.signal);
    const result = await this.#send(method, url, target, {
      body,
      headers,
      redirect: opts.allowRedirects === false ? 'manual' : 'follow',
      signal: mergeSignals([this.#controller.signal, timeoutSignal], settled.signal),
    });
    settled.abort();

    return result;
  }

  /**
   * Calls fetch and reads the body, mapping failures of either step.
   */
  async #send(
    method: HttpMethod,
    url: string,
    target: URL,
    init: Pick<RequestInit, 'body' | 'headers' | 'redirect' | 'signal'>,
  ): SafeWrapAsync<RequestError, TransportResponse> {
    const [errFetch, res] = await safeWrapAsync(() => fetch(target, { ...init, method }));
    if (errFetch) {
      log.debug({ method, url, err: errFetch }, 'request failed');
      return [new RequestError(toTransportError(errFetch, 'connect'), method, url), null];
    }

    const [errBody, text] = await safeWrapAsync(() => res.text());
    if (errBody) {
      log.debug({ method, url, err: errBody }, 'reading response failed');
      return [new RequestError(toTransportError(errBody, 'body'), method, url), null];
    }

    return [null, { status: res.status, headers: res.headers, url: res.url || target.href, body: text }];
  }

  /**
   * Aborts calls in flight with an {@link AbortError} and refuses new ones.
   */
  close(): void {
    this.#controller.abort(new AbortError('error requestor closed'));
  }
}
