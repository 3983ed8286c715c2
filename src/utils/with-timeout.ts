/**
 * Run an abortable operation under a deadline
 */

import { TimeoutError } from "../errors";

/**
 * Calls `fn` with a signal that aborts after `timeoutMs`.
 * Rejects with TimeoutError when the deadline passes first.
 * A timeout of 0 (or less) waits indefinitely.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  if (timeoutMs <= 0) {
    return fn(controller.signal);
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      // Deadline rejects before the signal aborts
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
