import { setTimeout as delay } from "timers/promises";
import { OperationCancelledError } from "@ebshield/core";
import type { SleepFn } from "./types";

export const defaultSleep: SleepFn = (ms, signal) => delay(ms, undefined, { signal });

export type PollOutcome<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
  intervalMs: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

/**
 * Call `check` until it reports done, sleeping `intervalMs` between calls.
 *
 * There is no timeout. Errors thrown by `check` end the loop; an abort of
 * `signal` ends it with an OperationCancelledError.
 */
export async function pollUntil<T>(
  description: string,
  check: () => Promise<PollOutcome<T>>,
  options: PollOptions
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const { signal } = options;

  for (;;) {
    if (signal?.aborted) {
      throw new OperationCancelledError(description);
    }

    const outcome = await check();
    if (outcome.done) {
      return outcome.value;
    }

    try {
      await sleep(options.intervalMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationCancelledError(description);
      }
      throw error;
    }
  }
}
