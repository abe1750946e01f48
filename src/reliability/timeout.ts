import { TimeoutExceededError } from '../types/errors.js';

/**
 * Race `operation` against a deadline.
 *
 * The operation receives an AbortSignal that fires when the deadline passes, so
 * it can kill its child process or cancel its request. The returned promise
 * rejects with TimeoutExceededError at the deadline whether or not the
 * operation honours the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message?: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutExceededError(timeoutMs, message);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
