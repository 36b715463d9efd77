import type { Clock } from "./clock";

export interface ManualClock extends Clock {
  /** Moves time forward without sleeping */
  advance: (ms: number) => void;
  /** Every requested sleep duration, in call order */
  getSleeps: () => readonly number[];
  /** Registers a callback run when a sleep starts, before time moves */
  onSleep: (listener: (ms: number) => void) => void;
}

/**
 * Virtual clock: `sleep` advances time by the requested amount and resolves on
 * the next microtask. An abort raised by an `onSleep` listener interrupts the
 * sleep before time moves.
 */
export const createManualClock = (startMs = 0): ManualClock => {
  let nowMs = startMs;
  const sleeps: number[] = [];
  const listeners: Array<(ms: number) => void> = [];

  const advance = (ms: number): void => {
    nowMs += ms;
  };

  const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      return;
    }

    sleeps.push(ms);
    for (const listener of listeners) {
      listener(ms);
    }

    if (signal?.aborted) {
      return;
    }

    advance(ms);
    await Promise.resolve();
  };

  return {
    now: () => nowMs,
    sleep,
    advance,
    getSleeps: () => [...sleeps],
    onSleep: (listener) => {
      listeners.push(listener);
    },
  };
};
