import { ConfigurationError } from '../error/configurationError.js';
import { createLogger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';

const log = createLogger('retry');

/**
 * Schedules request retries: how many attempts remain and how long to wait before the next one.
 *
 * Instances are immutable; consuming a retry returns a new instance.
 */
export abstract class RetryStrategy {
  /** Seconds to wait before the current attempt, or `null` for no wait. */
  abstract sleepSeconds(): number | null;

  /** Whether another attempt may follow the current one. */
  abstract shouldRetryOnFailure(): boolean;

  /** Strategy for the next attempt. The receiver is left unchanged. */
  abstract consumeAvailableRetry(): RetryStrategy;

  /** Waits until the current attempt may be made. */
  async sleep(): Promise<void> {
    const seconds = this.sleepSeconds();
    if (seconds === null) {
      return;
    }

    log.debug(`sleeping ${seconds.toFixed(2)} seconds prior to retry`);
    await sleep(seconds * 1000);
  }
}

/** Builds the first strategy state of a logical request. */
export type RetryStrategyFactory = () => RetryStrategy;

/**
 * A {@link RetryStrategy} that attempts a request a finite number of times.
 *
 * Only the last two attempts wait: under two seconds before the second to
 * last, two to four seconds before the last.
 */
export class FiniteRetryStrategy extends RetryStrategy {
  /** Set while deriving a consumed state, which may reach zero. */
  static #consuming = false;

  /** Attempts left, counting the current one */
  readonly remainingRetries: number;

  /**
   * @param retries - Number of times to attempt a request.
   */
  constructor(retries = 3) {
    super();
    const minimum = FiniteRetryStrategy.#consuming ? 0 : 1;
    if (!Number.isInteger(retries) || retries < minimum) {
      throw new ConfigurationError(`invalid retry count: ${retries}`);
    }

    this.remainingRetries = retries;
    Object.freeze(this);
  }

  sleepSeconds(): number | null {
    if (this.remainingRetries >= 3) {
      return null;
    }

    const base = this.remainingRetries === 2 ? 0 : 2;
    return base + 2 * Math.random();
  }

  shouldRetryOnFailure(): boolean {
    return this.remainingRetries > 1;
  }

  consumeAvailableRetry(): FiniteRetryStrategy {
    FiniteRetryStrategy.#consuming = true;
    try {
      return new FiniteRetryStrategy(Math.max(this.remainingRetries - 1, 0));
    } finally {
      FiniteRetryStrategy.#consuming = false;
    }
  }
}
