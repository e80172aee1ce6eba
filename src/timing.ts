/**
 * Cancellable delays for retry and reconnect loops.
 */

/**
 * Wait for `ms` milliseconds, or until `signal` aborts - whichever is first.
 * Never rejects: callers check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Exponential backoff: `baseMs * 2^attempt`, capped at `maxMs`.
 *
 * @example
 * computeBackoffMs(0, 1000, 60000) // 1000
 * computeBackoffMs(3, 1000, 60000) // 8000
 * computeBackoffMs(9, 1000, 60000) // 60000
 */
export function computeBackoffMs(
  attempt: number,
  baseMs: number,
  maxMs: number,
): number {
  const exponent = Math.max(0, Math.floor(attempt));
  return Math.min(baseMs * 2 ** exponent, maxMs);
}

/**
 * Resolve once `signal` aborts.
 */
export function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
