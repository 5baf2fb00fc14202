import pino from 'pino';

/**
 * Log levels:
 * - error (50): failures surfaced to the caller
 * - warn (40): retried attempts
 * - info (30): default
 * - debug (20): every attempt, response and sleep
 * - trace (10): unused
 */
const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Reads a level name, falling back to `info` for anything unknown. */
export function readLogLevel(value: string | undefined): pino.LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? 'info';
}

const children = new Set<pino.Logger>();

const baseLogger = pino({
  name: 'bearercore',
  level: readLogLevel(process.env.LOG_LEVEL),
  ...(process.env.LOG_PRETTY === 'true' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  }),
});

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const log = createLogger('session');
 * log.debug({ method, url }, 'fetching');
 * ```
 */
export function createLogger(context: string): pino.Logger {
  const child = baseLogger.child({ context });
  children.add(child);
  return child;
}

/**
 * Set the log level dynamically, for every logger created from this module.
 *
 * @example
 * ```typescript
 * setLogLevel('debug');
 * ```
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level;
  for (const child of children) {
    child.level = level;
  }
}
