/**
 * Time source and suspension point shared by the rate limiter and the retry controller.
 *
 * Readings are monotonic milliseconds. `sleep` resolves early (never rejects) when
 * the signal aborts; callers check `signal.aborted` afterwards.
 */

export interface Clock {
  /** Monotonic time in ms */
  now: () => number;
  /** Suspends for `ms`, or until `signal` aborts */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted || ms <= 0) {
    return Promise.resolve();
  }

  const wakeAt = performance.now() + ms;

  return new Promise((resolve) => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };

    // Timers may fire slightly before `performance.now()` reaches the target
    const schedule = (delayMs: number): void => {
      timeoutId = setTimeout(() => {
        const remainingMs = wakeAt - performance.now();
        if (remainingMs > 0) {
          schedule(Math.ceil(remainingMs));
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, delayMs);
    };

    schedule(ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};
