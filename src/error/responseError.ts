import type { TransportResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response the session could not turn into a result.
 */
export class ResponseError extends Error {
  /** ResponseError error-name */
  name = 'ResponseError';
  /** Response causing the ResponseError */
  #response: TransportResponse;

  /** Creates a new instance of a ResponseError with defaulting message + response to wrap */
  constructor(
    response: TransportResponse,
    message: string = `received ${response.status} HTTP response`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.#response = response;
  }

  /**
   * Response causing the ResponseError
   */
  get response(): TransportResponse {
    return this.#response;
  }
}

/** Any 4xx response the API reports as a client mistake. */
export class ClientError extends ResponseError {
  /** ClientError error-name */
  name = 'ClientError';
}

/** 400: the request was malformed. */
export class BadRequestError extends ClientError {
  /** BadRequestError error-name */
  name = 'BadRequestError';
}

/** 404: the resource does not exist. */
export class NotFoundError extends ClientError {
  /** NotFoundError error-name */
  name = 'NotFoundError';
}

/** 409: the request conflicts with the state of the resource. */
export class ConflictError extends ClientError {
  /** ConflictError error-name */
  name = 'ConflictError';
}

/** 413: the request body is too large. */
export class TooLargeError extends ClientError {
  /** TooLargeError error-name */
  name = 'TooLargeError';
}

/** 414: the request URI is too long. */
export class URITooLongError extends ClientError {
  /** URITooLongError error-name */
  name = 'URITooLongError';
}

/** 451: the resource is withheld for legal reasons. */
export class UnavailableForLegalReasonsError extends ClientError {
  /** UnavailableForLegalReasonsError error-name */
  name = 'UnavailableForLegalReasonsError';
}

/** 5xx and the two Cloudflare origin codes (520, 522). */
export class ServerError extends ResponseError {
  /** ServerError error-name */
  name = 'ServerError';
}

/** A 200-class response whose body is not valid JSON. */
export class MalformedPayloadError extends ResponseError {
  /** MalformedPayloadError error-name */
  name = 'MalformedPayloadError';
}

/**
 * Type guard for {@link ResponseError}, matching every subclass.
 */
export function isResponseError(error: unknown): error is ResponseError {
  return isErrorType(ResponseError, error);
}

/**
 * Extract a {@link ResponseError} from an unknown error value, following nested causes.
 */
export function getResponseError(error: unknown): null | ResponseError {
  return unwrapErrorType(ResponseError, error);
}

/**
 * Type guard for {@link ClientError}.
 */
export function isClientError(error: unknown): error is ClientError {
  return isErrorType(ClientError, error);
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}
