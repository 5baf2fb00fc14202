/**
 * Error entrypoint: exports the typed error taxonomy and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the session.
 * @module
 */

/** Error thrown when a request is aborted because its requestor was closed. */
export { AbortError, isAbortError } from './abortError.js';
/** 401/403 family, chosen from the `www-authenticate` header. */
export {
  AuthorizationError,
  authorizationError,
  ForbiddenError,
  getAuthorizationError,
  InsufficientScopeError,
  InvalidTokenError,
  isAuthorizationError,
  parseAuthenticateError,
} from './authorizationError.js';
/** Invalid wiring of collaborators or options. */
export { ConfigurationError, isConfigurationError } from './configurationError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** 301/302 responses, carrying the redirect target. */
export { isRedirectError, RedirectError } from './redirectError.js';
/** Transport failure wrapping the original network fault. */
export { getRequestError, isRequestError, RequestError } from './requestError.js';
/** Response-bearing errors and the client/server families. */
export {
  BadRequestError,
  ClientError,
  ConflictError,
  getResponseError,
  isClientError,
  isResponseError,
  isServerError,
  MalformedPayloadError,
  NotFoundError,
  ResponseError,
  ServerError,
  TooLargeError,
  UnavailableForLegalReasonsError,
  URITooLongError,
} from './responseError.js';
/** 415 responses with details from the body. */
export { isSpecialError, SpecialError } from './specialError.js';
/** 420/429 responses, carrying `retry-after`. */
export { isTooManyRequestsError, parseRetryAfter, TooManyRequestsError } from './tooManyRequestsError.js';
/** Network faults that are retried while attempts remain. */
export {
  ChunkedEncodingError,
  ConnectionError,
  isReadTimeoutError,
  isTransientTransportError,
  ReadTimeoutError,
  TRANSIENT_TRANSPORT_ERRORS,
} from './transportError.js';
/** A status the session has no rule for. */
export { isUnexpectedStatusError, UnexpectedStatusError } from './unexpectedStatusError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
