import { TimedOutError } from './errors';

/**
 * Race `promise` against a timer. The timer is always cleared, so a settled
 * call leaves nothing scheduled.
 *
 * @throws TimedOutError when the timer fires first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimedOutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
