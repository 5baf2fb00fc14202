/**
 * Core entrypoint: exports the session and its request types.
 * Import from here if you only need the session without the error helpers.
 * @module
 */

/** Session issuing authorized, paced and retried requests. */
export { type CreateSessionProps, createSession, Session } from './session.js';

/** Request options, normalized descriptors and results. */
export type {
  FormMapping,
  JsonObject,
  RequestDescriptor,
  RequestParams,
  RequestResult,
  SessionProps,
} from './types.js';
