import { setTimeout as delay } from 'node:timers/promises';

/**
 * Resolve after `ms`, or reject with an `AbortError` as soon as `signal`
 * aborts. Already-aborted signals reject immediately.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/** True for the rejection produced by an aborted `sleep` or AWS SDK call. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
