import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the client is wired up with invalid collaborators or options,
 * e.g. a value that is not an authorizer, or a user agent that is too short.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}
