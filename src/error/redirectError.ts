import type { TransportResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { ResponseError } from './responseError.js';

/**
 * 301/302: the API answered with a redirect, which is never followed automatically.
 */
export class RedirectError extends ResponseError {
  /** RedirectError error-name */
  name = 'RedirectError';
  /** Internal redirect target */
  #path: string;

  /** Creates a new instance of a RedirectError, reading the target from `location` */
  constructor(response: TransportResponse, opts?: ErrorOptions) {
    const location = response.headers.get('location') ?? '';
    const path = location.endsWith('.json') ? location.slice(0, -5) : location;
    const hint = path.includes('/login/')
      ? ' (You may be trying to perform a non-read-only action via a read-only instance.)'
      : '';
    super(response, `Redirect to ${path}${hint}`, opts);
    this.#path = path;
  }

  /** Redirect target, without a trailing `.json` */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link RedirectError}.
 */
export function isRedirectError(error: unknown): error is RedirectError {
  return isErrorType(RedirectError, error);
}
