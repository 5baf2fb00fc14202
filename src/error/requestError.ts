import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error wrapping any failure that happened while performing the network call
 * (connect, TLS, DNS, timeout, reading the body).
 */
export class RequestError extends Error {
  /** RequestError error-name */
  name = 'RequestError';
  /** Internal original failure */
  #originalError: unknown;
  /** Internal method of the failed request */
  #method: string;
  /** Internal URL of the failed request */
  #url: string;

  /** Creates a new instance of a RequestError around the original failure */
  constructor(originalError: unknown, method: string, url: string) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError);
    super(`error with request ${reason}`, { cause: originalError });
    this.#originalError = originalError;
    this.#method = method;
    this.#url = url;
  }

  /** Failure raised by the underlying network layer */
  get originalError(): unknown {
    return this.#originalError;
  }

  /** HTTP method of the failed request */
  get method(): string {
    return this.#method;
  }

  /** URL of the failed request */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link RequestError}.
 */
export function isRequestError(error: unknown): error is RequestError {
  return isErrorType(RequestError, error);
}

/**
 * Extract a {@link RequestError} from an unknown error value, following nested causes.
 */
export function getRequestError(error: unknown): null | RequestError {
  return unwrapErrorType(RequestError, error);
}
