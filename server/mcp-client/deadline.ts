import { TimeoutError } from '../errors.js';
import { logger } from '../observability/logger.js';

export interface DeadlineOptions<T> {
  /**
   * Release a value that arrives after the deadline already fired, e.g. a session whose
   * handshake completed late.
   */
  release?: (value: T) => void | Promise<void>;
}

/**
 * Run `work` with a deadline. On expiry the work's signal is aborted with a
 * `TimeoutError` and the returned promise rejects with it; a late result is handed
 * to `release` so nothing acquired by the work leaks.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  operation: string,
  work: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions<T> = {},
): Promise<T> {
  const controller = new AbortController();
  const pending = work(controller.signal);
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const timeout = new TimeoutError(operation, timeoutMs);
      controller.abort(timeout);
      reject(timeout);
    }, timeoutMs);
  });

  try {
    return await Promise.race([pending, expired]);
  } finally {
    clearTimeout(timer);
    if (controller.signal.aborted) {
      void pending.then(
        async value => {
          logger.debug('Releasing result that arrived after the deadline', { operation });
          await options.release?.(value);
        },
        (error: unknown) => {
          logger.debug('Work abandoned at deadline failed afterwards', {
            operation,
            error: error instanceof Error ? error.message : String(error),
          });
        },
      ).catch((error: unknown) => {
        logger.warn('Failed to release late result', {
          operation,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }
}
