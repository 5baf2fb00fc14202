import { isAbortError } from '../error/abortError.js';
import { ChunkedEncodingError, ConnectionError, isReadTimeoutError } from '../error/transportError.js';
import type { FormPairs, HeaderOptions, QueryParams, RawBody, TransportRequestOptions } from '../types/request.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge default and per-call headers into a single `Headers` instance, normalizing keys.
 * A `null` or `undefined` value removes the header.
 */
export function mergeHeaderOptions(defaultHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(defaultHeaders), ...toEntries(localHeaders)]) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}

/**
 * Resolves the request URL with its query parameters appended.
 */
export function buildUrl(url: string, params?: QueryParams): URL {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params ?? {})) {
    target.searchParams.append(key, String(value));
  }

  return target;
}

/** Encoded request body, with the content type fetch cannot infer on its own. */
export interface EncodedBody {
  body?: BodyInit;
  contentType?: string;
}

/** Whether `data` holds form pairs rather than a raw body. */
export function isFormPairs(data: FormPairs | RawBody): data is FormPairs {
  return Array.isArray(data);
}

/**
 * Encodes the body of a call.
 *
 * Precedence: `files` as multipart (with `data` pairs as fields), then `data`
 * pairs as url-encoded form, then raw `data`, then `json`.
 */
export function encodeBody(opts: Pick<TransportRequestOptions, 'data' | 'files' | 'json'>): EncodedBody {
  const { data, files, json } = opts;

  if (files !== undefined) {
    const form = new FormData();
    if (data !== undefined && isFormPairs(data)) {
      for (const [key, value] of data) {
        form.append(key, String(value));
      }
    }
    for (const [name, file] of Object.entries(files)) {
      form.append(name, file);
    }
    return { body: form };
  }

  if (data !== undefined) {
    if (isFormPairs(data)) {
      return { body: new URLSearchParams(data.map(([key, value]) => [key, String(value)])) };
    }
    return { body: data };
  }

  if (json !== undefined) {
    return { body: JSON.stringify(json), contentType: 'application/json' };
  }

  return {};
}

/** Socket-level codes that mean the connection failed or was reset. */
export const CONNECTION_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_CLOSED',
]);

/**
 * First string `code` found on the error or its causes.
 */
export function readErrorCode(error: unknown): string | null {
  let current = error;
  while (current instanceof Error) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }

  return null;
}

/**
 * Normalizes a failure of the network layer.
 *
 * - timeouts and aborts are kept
 * - a failure while reading the body is a {@link ChunkedEncodingError}
 * - connect/reset faults are a {@link ConnectionError}
 */
export function toTransportError(error: unknown, phase: 'connect' | 'body'): unknown {
  if (isReadTimeoutError(error) || isAbortError(error)) {
    return error;
  }

  if (phase === 'body') {
    return new ChunkedEncodingError('error reading response body', { cause: error });
  }

  const code = readErrorCode(error);
  if (code !== null && CONNECTION_ERROR_CODES.has(code)) {
    return new ConnectionError(`connection failed with ${code}`, { cause: error });
  }

  return error;
}
