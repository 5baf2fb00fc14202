import type { Authorizer } from '../auth/authorizer.js';
import type { RateLimiterDefinition } from '../rateLimit/limiter.js';
import type { RetryStrategyFactory } from '../retry/strategy.js';
import type {
  FileMap,
  FormPairs,
  FormValue,
  HttpMethod,
  JsonValue,
  QueryParams,
  RawBody,
  RequestorDefinition,
} from '../types/request.js';

/** Form fields given as a mapping; sent as key-sorted pairs. */
export type FormMapping = Readonly<Record<string, FormValue>>;

/** A JSON object payload. */
export type JsonObject = { [key: string]: JsonValue };

/** Per-call options of {@link Session.request}. */
export interface RequestParams {
  /** Form fields, or a raw body sent unchanged. */
  data?: FormMapping | RawBody;
  /** Files sent as multipart. */
  files?: FileMap;
  /** JSON body. */
  json?: JsonValue;
  /** Query parameters. */
  params?: QueryParams;
  /** Per-attempt timeout in milliseconds. */
  timeout?: number;
}

/** A request after normalization, shared by every attempt. */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly url: string;
  readonly params: QueryParams;
  readonly data?: FormPairs | RawBody;
  readonly files?: FileMap;
  readonly json?: JsonValue;
  readonly timeout?: number;
}

/** Decoded body of a successful call: JSON, `''` for an empty body, `null` for 204. */
export type RequestResult = JsonValue;

/** Configuration for constructing a {@link Session}. */
export interface SessionProps {
  /** Source of the bearer token. */
  authorizer: Authorizer;
  /** Transport performing each network call. */
  requestor: RequestorDefinition;
  /** Paces calls. Defaults to a fresh {@link RateLimiter}. */
  rateLimiter?: RateLimiterDefinition;
  /** Builds the retry state of each logical request. Defaults to three attempts. */
  retryStrategy?: RetryStrategyFactory;
}
