import { z } from 'zod';
import type { TransportResponse } from '../types/request.js';
import { safeWrap } from '../utils/wrap.js';
import { isErrorType } from './isErrorType.js';
import { ClientError } from './responseError.js';

const SpecialErrorBodySchema = z.object({
  message: z.string().catch(''),
  reason: z.string().catch(''),
  special_errors: z.array(z.string()).catch([]),
});

/**
 * 415: the API rejected the request with an explanation in the body.
 */
export class SpecialError extends ClientError {
  /** SpecialError error-name */
  name = 'SpecialError';
  /** Human readable explanation from the body */
  readonly reason: string;
  /** Machine readable error codes from the body */
  readonly specialErrors: string[];
  /** Message from the body */
  readonly detail: string;

  /** Creates a new instance of a SpecialError, reading details from the JSON body */
  constructor(response: TransportResponse, opts?: ErrorOptions) {
    const [, parsed] = safeWrap(() => JSON.parse(response.body));
    const result = SpecialErrorBodySchema.safeParse(parsed ?? {});
    const body = result.success ? result.data : { message: '', reason: '', special_errors: [] };

    super(response, `Special error ${JSON.stringify(body.message)}`, opts);
    this.detail = body.message;
    this.reason = body.reason;
    this.specialErrors = body.special_errors;
  }
}

/**
 * Type guard for {@link SpecialError}.
 */
export function isSpecialError(error: unknown): error is SpecialError {
  return isErrorType(SpecialError, error);
}
