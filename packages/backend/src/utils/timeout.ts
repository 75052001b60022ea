/**
 * Bounded waits for execution steps
 */

import { TimeoutError } from './errors.js';

/**
 * Race a promise against a timer. The timer is always cleared, and the
 * underlying work is not cancelled: a shared load keeps running for its
 * other waiters. `onTimeout` lets the caller tell that work to stop before
 * it commits anything.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  message: string,
  onTimeout?: (error: TimeoutError) => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      work,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(message);
          onTimeout?.(error);
          reject(error);
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
