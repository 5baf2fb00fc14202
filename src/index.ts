/**
 * Root entrypoint for bearercore: re-exports the session, its collaborators and the error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/** Session issuing authorized, paced and retried requests. */
export { type CreateSessionProps, createSession, Session } from './core/session.js';

/** Request options, normalized descriptors and results. */
export type {
  FormMapping,
  JsonObject,
  RequestDescriptor,
  RequestParams,
  RequestResult,
  SessionProps,
} from './core/types.js';

/** Bearer token sources. */
export {
  type Authorizer,
  isAuthorizer,
  isRefreshable,
  type RefreshableAuthorizer,
  RefreshingAuthorizer,
  type RefreshingAuthorizerOptions,
  StaticAuthorizer,
  type StaticAuthorizerOptions,
  type TokenGrant,
  TokenGrantSchema,
} from './auth/authorizer.js';

/** Environment configuration. */
export { type ClientConfig, EnvSchema, loadConfig } from './config/config.js';

/** Header-driven request pacing. */
export { type HeaderCallback, RateLimiter, type RateLimiterDefinition } from './rateLimit/limiter.js';

/** Transport over the native `fetch`. */
export { Requestor, type RequestorOptions } from './requestor/client.js';

/** Retry scheduling. */
export { FiniteRetryStrategy, RetryStrategy, type RetryStrategyFactory } from './retry/strategy.js';

/** Shared transport types. */
export type {
  FileMap,
  FormPairs,
  FormValue,
  HeaderOptions,
  HttpMethod,
  JsonValue,
  QueryParams,
  RawBody,
  RequestorDefinition,
  TransportRequestFn,
  TransportRequestOptions,
  TransportResponse,
} from './types/request.js';

/** Logging controls. */
export { createLogger, setLogLevel } from './utils/logger.js';

/** Error-first tuple results. */
export { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './utils/wrap.js';

/** Error taxonomy and helpers. */
export * from './error/index.js';
