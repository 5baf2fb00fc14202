import { isErrorType } from './isErrorType.js';

/** The connection could not be established, or was reset by the peer. */
export class ConnectionError extends Error {
  /** ConnectionError error-name */
  name = 'ConnectionError';
}

/** The response body was cut off while it was being read. */
export class ChunkedEncodingError extends Error {
  /** ChunkedEncodingError error-name */
  name = 'ChunkedEncodingError';
}

/** No response arrived within the per-attempt timeout. */
export class ReadTimeoutError extends Error {
  /** ReadTimeoutError error-name */
  name = 'ReadTimeoutError';
  /** Internal timeout that elapsed, in milliseconds */
  #timeout: number;

  /** Creates a new instance of a ReadTimeoutError with the elapsed timeout */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#timeout = timeout;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Transport faults that are worth another attempt.
 */
export const TRANSIENT_TRANSPORT_ERRORS = [ChunkedEncodingError, ConnectionError, ReadTimeoutError] as const;

/**
 * Whether an error (or anything on its cause chain) is a transient transport fault.
 */
export function isTransientTransportError(error: unknown): boolean {
  return TRANSIENT_TRANSPORT_ERRORS.some((errorClass) => isErrorType(errorClass, error));
}

/**
 * Type guard for {@link ReadTimeoutError}.
 */
export function isReadTimeoutError(error: unknown): error is ReadTimeoutError {
  return isErrorType(ReadTimeoutError, error);
}
