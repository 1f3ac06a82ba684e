import { setTimeout as delay } from "node:timers/promises";

/**
 * Monotonic time source in seconds.
 */
export type Clock = () => number;

/**
 * Delay used between retries of an operation that would block.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Create a monotonic clock measuring seconds since its creation.
 *
 * Call once per process, before any session starts, and hand the result
 * to the loops.
 */
export function createMonotonicClock(): Clock {
  const origin = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - origin) / 1e9;
}

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};
