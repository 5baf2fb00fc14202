import type { TransportResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { ClientError } from './responseError.js';

/**
 * Reads `retry-after` as seconds, accepting both a delay and an HTTP date.
 */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) {
    return null;
  }

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(seconds, 0);
  }

  const date = Date.parse(header);
  if (Number.isNaN(date)) {
    return null;
  }

  return Math.max(Math.ceil((date - now) / 1000), 0);
}

/**
 * 420/429: the quota for the current window is used up.
 */
export class TooManyRequestsError extends ClientError {
  /** TooManyRequestsError error-name */
  name = 'TooManyRequestsError';
  /** Seconds to wait before calling again, when the API says so */
  readonly retryAfter: number | null;

  /** Creates a new instance of a TooManyRequestsError, reading `retry-after` */
  constructor(response: TransportResponse, opts?: ErrorOptions) {
    super(response, undefined, opts);
    this.retryAfter = parseRetryAfter(response.headers.get('retry-after'));
  }
}

/**
 * Type guard for {@link TooManyRequestsError}.
 */
export function isTooManyRequestsError(error: unknown): error is TooManyRequestsError {
  return isErrorType(TooManyRequestsError, error);
}
