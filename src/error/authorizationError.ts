import type { TransportResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { ResponseError } from './responseError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** 401 or 403: the bearer token was not accepted. */
export class AuthorizationError extends ResponseError {
  /** AuthorizationError error-name */
  name = 'AuthorizationError';
}

/** 403 without a more specific `www-authenticate` reason. */
export class ForbiddenError extends AuthorizationError {
  /** ForbiddenError error-name */
  name = 'ForbiddenError';
}

/** The token lacks a scope the endpoint requires. */
export class InsufficientScopeError extends AuthorizationError {
  /** InsufficientScopeError error-name */
  name = 'InsufficientScopeError';
}

/** The token is expired, revoked or malformed. */
export class InvalidTokenError extends AuthorizationError {
  /** InvalidTokenError error-name */
  name = 'InvalidTokenError';
}

/**
 * Reads the `error=` value at the end of a `www-authenticate` header,
 * e.g. `Bearer realm="api", error="insufficient_scope"` gives `insufficient_scope`.
 */
export function parseAuthenticateError(header: string | null): string | null {
  if (!header) {
    return null;
  }

  const unquoted = header.replaceAll('"', '');
  const index = unquoted.lastIndexOf('=');
  if (index === -1) {
    return null;
  }

  return unquoted.slice(index + 1).trim() || null;
}

/**
 * Builds the {@link AuthorizationError} subclass matching a 401/403 response.
 */
export function authorizationError(response: TransportResponse): AuthorizationError {
  const reason = parseAuthenticateError(response.headers.get('www-authenticate'));
  if (reason === 'insufficient_scope') {
    return new InsufficientScopeError(response);
  }

  if (reason === 'invalid_token') {
    return new InvalidTokenError(response);
  }

  if (response.status === 403) {
    return new ForbiddenError(response);
  }

  return new InvalidTokenError(response);
}

/**
 * Type guard for {@link AuthorizationError}.
 */
export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return isErrorType(AuthorizationError, error);
}

/**
 * Extract an {@link AuthorizationError} from an unknown error value, following nested causes.
 */
export function getAuthorizationError(error: unknown): null | AuthorizationError {
  return unwrapErrorType(AuthorizationError, error);
}
