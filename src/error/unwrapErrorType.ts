/** Any error constructor, regardless of its argument list. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 *
 * Matches by `instanceof` first, and by `name` so that errors crossing a
 * duplicated copy of this package are still recognised.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    if (current.name === errorClass.name) {
      return current as T;
    }

    current = current.cause;
  }

  return null;
}
