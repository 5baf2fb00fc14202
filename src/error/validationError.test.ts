import { describe, expect, it } from 'vitest';
import { getValidationError, isValidationError, ValidationError } from './validationError.js';

describe('ValidationError', () => {
  it('lists each issue with its path in the message', () => {
    const issues = [
      { message: 'Required', path: ['access_token'] },
      { message: 'Expected number', path: [{ key: 'grant' }, 'expires_in'] },
    ];
    const err = new ValidationError('error validating token grant', issues);

    expect(err.message).toBe(
      'error validating token grant: access_token: Required; grant.expires_in: Expected number',
    );
    expect(err.issues).toEqual(issues);
  });

  it('keeps the bare message without issues', () => {
    expect(new ValidationError('error validating data', []).message).toBe('error validating data');
  });

  it('reports distinct fields, with (root) for the value itself', () => {
    const err = new ValidationError('error validating data', [
      { message: 'Too short', path: ['BEARERCORE_USER_AGENT'] },
      { message: 'Invalid', path: ['BEARERCORE_USER_AGENT'] },
      { message: 'Expected object' },
    ]);

    expect(err.fields).toEqual(['BEARERCORE_USER_AGENT', '(root)']);
  });

  it('expect non ValidationError to return false', () => {
    expect(isValidationError(new Error('error'))).toEqual(false);
  });

  it('unwraps a ValidationError from a cause', () => {
    const validationErr = new ValidationError('error-validating', []);
    const err = new Error('error', { cause: validationErr });

    expect(getValidationError(err)).toStrictEqual(validationErr);
  });
});
