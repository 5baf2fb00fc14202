import type {
  HttpMethod,
  TransportRequestFn,
  TransportRequestOptions,
  TransportResponse,
} from '../types/request.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const log = createLogger('rateLimit');

/** Produces the authorization headers of the next call. */
export type HeaderCallback = () => SafeWrapAsync<Error, Record<string, string>>;

/** Contract the session uses to pace its calls. */
export interface RateLimiterDefinition {
  call(
    requestFn: TransportRequestFn,
    headerCallback: HeaderCallback,
    method: HttpMethod,
    url: string,
    opts: TransportRequestOptions,
  ): SafeWrapAsync<Error, TransportResponse>;
}

/** Seconds since the epoch. */
function now(): number {
  return Date.now() / 1000;
}

/**
 * Paces requests using the `x-ratelimit-*` headers of previous responses.
 *
 * Requests are spread out over the remaining window rather than sent in a
 * burst and then blocked until the window resets.
 */
export class RateLimiter implements RateLimiterDefinition {
  #remaining: number | null = null;
  #used: number | null = null;
  #resetTimestamp: number | null = null;
  #nextRequestTimestamp: number | null = null;

  /** Requests left in the current window, if known. */
  get remaining() {
    return this.#remaining;
  }

  /** Requests made in the current window, if known. */
  get used() {
    return this.#used;
  }

  /** Epoch seconds at which the current window resets. */
  get resetTimestamp() {
    return this.#resetTimestamp;
  }

  /** Epoch seconds before which no request is sent. */
  get nextRequestTimestamp() {
    return this.#nextRequestTimestamp;
  }

  /**
   * Waits as needed, then performs one call with fresh authorization headers.
   *
   * Errors from `headerCallback` and `requestFn` are returned unchanged.
   */
  async call(
    requestFn: TransportRequestFn,
    headerCallback: HeaderCallback,
    method: HttpMethod,
    url: string,
    opts: TransportRequestOptions,
  ): SafeWrapAsync<Error, TransportResponse> {
    await this.delay();

    const [errHeaders, headers] = await headerCallback();
    if (errHeaders) {
      return [errHeaders, null];
    }

    const [err, response] = await requestFn(method, url, { ...opts, headers });
    if (err) {
      return [err, null];
    }

    this.update(response.headers);
    return [null, response];
  }

  /** Sleeps until the next request is allowed. */
  async delay(): Promise<void> {
    if (this.#nextRequestTimestamp === null) {
      return;
    }

    const seconds = this.#nextRequestTimestamp - now();
    if (seconds <= 0) {
      return;
    }

    log.debug(`sleeping ${seconds.toFixed(2)} seconds prior to call`);
    await sleep(seconds * 1000);
  }

  /** Updates the window from response headers. */
  update(headers: Headers): void {
    const remainingHeader = headers.get('x-ratelimit-remaining');
    if (remainingHeader === null) {
      if (this.#remaining !== null && this.#used !== null) {
        this.#remaining -= 1;
        this.#used += 1;
      }
      return;
    }

    const remaining = Number.parseFloat(remainingHeader);
    const secondsToReset = Number.parseInt(headers.get('x-ratelimit-reset') ?? '0', 10);
    const used = Number.parseInt(headers.get('x-ratelimit-used') ?? '0', 10);
    if (!Number.isFinite(remaining) || !Number.isFinite(secondsToReset) || !Number.isFinite(used)) {
      log.debug({ remaining: remainingHeader }, 'ignoring malformed rate limit headers');
      return;
    }

    const current = now();
    this.#remaining = remaining;
    this.#used = used;
    this.#resetTimestamp = current + secondsToReset;

    if (remaining <= 0) {
      this.#nextRequestTimestamp = current + secondsToReset;
      return;
    }

    const spread = Math.min(Math.max((secondsToReset - remaining) / 2, 0), 10);
    this.#nextRequestTimestamp = Math.min(current + secondsToReset, current + spread);
  }
}
