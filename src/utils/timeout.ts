/**
 * withTimeout: reject if a promise does not settle in time
 */

import { TimeoutError } from '../kernel/errors.js';

/**
 * Race `promise` against a timer. The timer is cleared as soon as the promise
 * settles. The underlying work is not cancelled.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
