/**
 * Timing helpers shared by the rate limiter, processor and scheduler
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Promise-based sleep. Rejects with an AbortError when `signal` aborts.
 * Injected wherever a wait happens so tests can run without real delays.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal ? { signal } : undefined);
};

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}
