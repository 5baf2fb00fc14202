import type { TransportResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';

/**
 * A status the session has no rule for, signalling a changed API contract.
 * Not part of the {@link ResponseError} family.
 */
export class UnexpectedStatusError extends Error {
  /** UnexpectedStatusError error-name */
  name = 'UnexpectedStatusError';
  /** Response carrying the unexpected status */
  #response: TransportResponse;

  /** Creates a new instance of an UnexpectedStatusError for the response */
  constructor(response: TransportResponse, opts?: ErrorOptions) {
    super(`Unexpected status code: ${response.status}`, opts);
    this.#response = response;
  }

  /** Response carrying the unexpected status */
  get response(): TransportResponse {
    return this.#response;
  }
}

/**
 * Type guard for {@link UnexpectedStatusError}.
 */
export function isUnexpectedStatusError(error: unknown): error is UnexpectedStatusError {
  return isErrorType(UnexpectedStatusError, error);
}
