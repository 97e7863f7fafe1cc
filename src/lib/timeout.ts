// ============================================
// Bounded waits for external calls
// ============================================

import { cancelledError, timeoutError } from "./errors.js";

/**
 * Run `work` against a deadline and the caller's abort signal.
 *
 * `work` receives a signal that fires when either one wins, so the underlying
 * request is torn down instead of left running.
 * Rejects with TIMEOUT when the timer wins and RUN_CANCELLED when the caller aborts.
 */
export async function withTimeout<T>(
  operation: string,
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const stopped = new Promise<never>((_, reject) => {
    const stop = (err: Error) => {
      controller.abort(err);
      reject(err);
    };

    timer = setTimeout(() => stop(timeoutError(operation, timeoutMs)), timeoutMs);

    if (!signal) return;
    onAbort = () => stop(cancelledError(undefined, signal.reason));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    if (controller.signal.aborted) {
      return await stopped;
    }
    return await Promise.race([work(controller.signal), stopped]);
  } finally {
    clearTimeout(timer);
    if (signal && onAbort) {
      signal.removeEventListener("abort", onAbort);
    }
  }
}
