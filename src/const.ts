/** Package version sent in the User-Agent header */
export const VERSION = '0.1.0';

/** Per-attempt timeout in milliseconds */
export const DEFAULT_TIMEOUT = 16_000;
