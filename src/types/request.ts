import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP verbs accepted by the session. */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS';

/** Header options accepted by the requestor; `null` removes a default header. */
export type HeaderOptions = Headers | [string, string][] | Record<string, string | null | undefined>;

/** Scalar values allowed in form bodies and query strings. */
export type FormValue = string | number | boolean;

/** Key-sorted form fields, the wire shape of a mapping `data` payload. */
export type FormPairs = ReadonlyArray<readonly [string, FormValue]>;

/** Body payloads that are sent as-is. */
export type RawBody = string | ArrayBuffer | Blob;

/** Files for a multipart body, keyed by field name. */
export type FileMap = Readonly<Record<string, Blob>>;

/** Any value `JSON.parse` can produce. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** Query parameters appended to the request URL. */
export type QueryParams = Readonly<Record<string, FormValue>>;

/** A response whose body has already been read in full. */
export interface TransportResponse {
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: Headers;
  /** Final URL of the response */
  url: string;
  /** Raw response body */
  body: string;
}

/** Options for a single network call. */
export interface TransportRequestOptions {
  /** Headers merged over the requestor defaults. */
  headers?: HeaderOptions;
  /** Query parameters. */
  params?: QueryParams;
  /** Form pairs or a raw body. */
  data?: FormPairs | RawBody;
  /** Files, sent as multipart together with form pairs. */
  files?: FileMap;
  /** JSON body, used only when neither `data` nor `files` is set. */
  json?: JsonValue;
  /**
   * Timeout of this call in milliseconds.
   * @default 16000
   */
  timeout?: number;
  /**
   * Whether 3xx responses are followed.
   * @default true
   */
  allowRedirects?: boolean;
}

/** Function performing one network call, as handed to the rate limiter. */
export type TransportRequestFn = (
  method: HttpMethod,
  url: string,
  opts: TransportRequestOptions,
) => SafeWrapAsync<Error, TransportResponse>;

/** Contract for transport implementations used by the session. */
export interface RequestorDefinition {
  /** Base URL that request paths are resolved against. */
  readonly oauthUrl: string;
  /** Performs one network call. */
  request: TransportRequestFn;
  /** Releases underlying resources and aborts calls in flight. */
  close: () => void;
}
