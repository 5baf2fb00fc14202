/**
 * Error-first result, `[error, data]`. Exactly one side is `null`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/** Promise of a {@link SafeWrap}. */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Turns anything thrown into an `Error`, keeping the thrown value as `cause`.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }

  return new Error(`non-error thrown: ${String(thrown)}`, { cause: thrown });
}

/**
 * Runs a promise factory and settles into a tuple; a synchronous throw counts as a rejection.
 * @example
 * const [error, grant] = await safeWrapAsync(() => fetchToken(refreshToken));
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    return [null, await promise()];
  } catch (thrown) {
    return [toError(thrown), null];
  }
}

/**
 * Synchronous {@link safeWrapAsync}.
 * @example
 * const [error, payload] = safeWrap(() => JSON.parse(response.body));
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    return [null, fn()];
  } catch (thrown) {
    return [toError(thrown), null];
  }
}
