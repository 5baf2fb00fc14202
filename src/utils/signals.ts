import { AbortError } from '../error/abortError.js';
import { ReadTimeoutError } from '../error/transportError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link ReadTimeoutError}
 * after the specified timeout.
 *
 * When `timeoutMs` is `0` or missing, no timeout signal is created.
 * Aborting `settled` cancels the pending timer once the guarded work is done.
 */
export function createTimeoutSignal(timeoutMs?: number, settled?: AbortSignal): AbortSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new ReadTimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });
  settled?.addEventListener('abort', () => clearTimeout(timeout), { once: true });

  return controller.signal;
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort when any of the source signals abort.
 * - Preserves the abort `reason` when available, otherwise
 *   aborts with an {@link AbortError}.
 * - Aborting `settled` detaches the merged signal from its sources, so
 *   long-lived sources do not collect one listener per merge.
 */
export function mergeSignals(
  signals: Array<AbortSignal | null | undefined>,
  settled?: AbortSignal,
): AbortSignal | null {
  const active: AbortSignal[] = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0];
  }

  const controller = new AbortController();
  const listeners: VoidFunction[] = [];
  const abortFrom = (source: AbortSignal) => {
    if (source.reason !== undefined) {
      controller.abort(source.reason);
      return;
    }

    controller.abort(new AbortError('error signal triggered with unknown reason'));
  };

  const detach = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };
  controller.signal.addEventListener('abort', detach, { once: true });
  settled?.addEventListener('abort', detach, { once: true });

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}
