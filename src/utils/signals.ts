import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/** Largest delay `setTimeout` honours; longer delays fire after 1ms instead. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Cancellation signal of a single exchange, following a parent signal and a timeout.
 */
export interface ExchangeSignal {
  /** Aborts with the parent's reason, or a `TimeoutError` once the timeout elapses. */
  readonly signal: AbortSignal;
  /** Stops following the parent signal. The timeout keeps running. */
  detach(): void;
  /** Stops following the parent signal and clears the timeout. */
  dispose(): void;
}

/**
 * Creates the signal for one exchange: it aborts when `parent` aborts or after `timeoutMs`,
 * whichever comes first. `false` or `0` disables the timeout. Delays beyond
 * {@link MAX_TIMEOUT_MS} are clamped to it.
 *
 * The only listener added to `parent` is removed on abort, `detach` or `dispose`, so
 * long-lived parents can be shared by any number of exchanges.
 *
 * The timer is unref'd: it keeps covering the response body read that follows
 * a send, without holding the process open once everything else is done.
 */
export function createExchangeSignal(parent: AbortSignal | null | undefined, timeoutMs: number | false): ExchangeSignal {
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | undefined;
  let detach: () => void = () => undefined;

  const dispose = () => {
    detach();
    clearTimeout(timeout);
  };

  if (parent?.aborted) {
    controller.abort(abortReason(parent));
    return { signal: controller.signal, detach, dispose };
  }

  if (parent) {
    const onAbort = () => controller.abort(abortReason(parent));
    parent.addEventListener('abort', onAbort, { once: true });
    detach = () => parent.removeEventListener('abort', onAbort);
  }

  if (timeoutMs) {
    timeout = setTimeout(
      () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
      Math.min(timeoutMs, MAX_TIMEOUT_MS),
    );
    timeout.unref();
  }

  controller.signal.addEventListener('abort', dispose, { once: true });

  return { signal: controller.signal, detach: () => detach(), dispose };
}

/**
 * Reason an aborted signal should surface with. Non-error reasons are wrapped in an {@link AbortError}.
 */
export function abortReason(signal: AbortSignal): Error {
  const { reason } = signal;
  if (reason instanceof Error) {
    return reason;
  }

  return new AbortError('error signal triggered with unknown reason', { cause: reason });
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * Behavior:
 * - If no signals are provided, returns `null`.
 * - If a single signal is provided, it is returned as-is.
 * - If multiple signals are provided, a new `AbortController` is created
 *   and will abort with the reason of whichever source aborts first.
 *
 * @param signals - List of signals to merge (nullable/undefined allowed).
 * @returns A single `AbortSignal` or `null` if all inputs are nullish.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): AbortSignal | null {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return null;
  }

  if (active.length === 1) {
    return active[0];
  }

  const controller = new AbortController();
  const listeners: (() => void)[] = [];

  controller.signal.addEventListener('abort', () => {
    for (const remove of listeners) {
      remove();
    }
  });

  for (const signal of active) {
    if (signal.aborted) {
      controller.abort(abortReason(signal));
      break;
    }

    const abort = () => controller.abort(abortReason(signal));
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return controller.signal;
}

/**
 * Settles with `task`, unless `signal` aborts first, in which case it rejects with the abort reason.
 *
 * Transports that ignore the request signal are still bound by the timeout this way.
 */
export function raceSignal<T>(task: Promise<T>, signal: AbortSignal | null): Promise<T> {
  if (!signal) {
    return task;
  }

  if (signal.aborted) {
    // The task may still reject later; that outcome is discarded.
    void task.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    void task.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
