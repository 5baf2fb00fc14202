import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Dotted path of an issue, `(root)` for the value itself. */
function formatPath(path: StandardSchemaV1.Issue['path']): string {
  if (!path || path.length === 0) {
    return '(root)';
  }

  return path.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
}

/**
 * A value rejected by its schema, e.g. a token grant or the environment.
 *
 * The message lists each issue as `path: message`.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Issues reported by the schema */
  readonly issues: readonly StandardSchemaV1.Issue[];

  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    const details = issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`).join('; ');
    super(details ? `${message}: ${details}` : message, opts);

    this.issues = issues;
  }

  /** Distinct dotted paths of the rejected fields. */
  get fields(): string[] {
    return [...new Set(this.issues.map((issue) => formatPath(issue.path)))];
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
