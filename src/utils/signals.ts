import { TimeoutError } from '../error/timeoutError.js';

/** Abort signal bound to a timer, with a handle to stop the timer early. */
export interface TimeoutSignal {
  /** Signal aborted with a {@link TimeoutError} once the timeout elapses. */
  signal: AbortSignal;
  /** Stops the timer; call once the request has settled. */
  clear: () => void;
}

/**
 * Creates an {@link AbortSignal} that will automatically abort after
 * the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 *
 * @param timeoutMs - Timeout in milliseconds, or `false` to disable.
 * @returns The signal and its cleanup, or `null`.
 */
export function createTimeoutSignal(timeoutMs?: number | false): TimeoutSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );

  return {
    signal: controller.signal,
    clear: () => clearTimeout(timeout),
  };
}
