import { DeadlineExceededError } from '../errors.js';

/**
 * A run deadline: one signal that aborts when the time budget runs out or the
 * caller's own signal aborts, whichever comes first.
 */
export interface Deadline {
  signal: AbortSignal;

  /** Milliseconds left before the deadline (never negative). */
  remainingMs(): number;

  /** Stop the timer and detach from the parent signal. */
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const expiresAt = Date.now() + timeoutMs;

  const handle = setTimeout(() => {
    controller.abort(new DeadlineExceededError(`Audit deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);
  handle.unref?.();

  const onParentAbort = (): void => {
    controller.abort(new DeadlineExceededError('Audit cancelled by caller'));
  };
  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  return {
    signal: controller.signal,
    remainingMs: () => Math.max(0, expiresAt - Date.now()),
    dispose: () => {
      clearTimeout(handle);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Reason a signal was aborted with, as an `Error`.
 */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new DeadlineExceededError();
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts. The underlying work is not cancelled; callers release resources.
 */
export async function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortReason(signal));
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  }
}
