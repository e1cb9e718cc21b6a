import { setTimeout as sleep } from "node:timers/promises";

/**
 * Delay execution for a given number of milliseconds.
 * Resolves early, without throwing, when the signal aborts.
 * @param milliseconds - Duration to wait.
 * @param signal - Abort signal cutting the wait short.
 * @returns Promise that resolves after the delay or on abort.
 */
export const delay = async (milliseconds: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return;
  }
  try {
    await sleep(milliseconds, undefined, signal ? { signal } : undefined);
  } catch (error) {
    if (signal?.aborted) {
      return;
    }
    throw error;
  }
};
