import { AppError } from '../errors/AppError.js';

/**
 * Wraps an async function with a timeout using AbortController.
 *
 * The function receives an AbortSignal that should be forwarded to calls that
 * support cancellation (the OpenAI SDK does). Calls that ignore the signal are
 * still raced against the timer, so the caller is never left pending.
 *
 * @param ms - Timeout in milliseconds
 * @param label - Operation name used in the error details
 * @throws AppError with category TIMEOUT if the operation times out
 *
 * @example
 * ```ts
 * const product = await withTimeout(
 *   () => store.getProduct(id),
 *   config.timeouts.dbMs,
 *   'add_to_cart'
 * );
 * ```
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  const { signal } = controller;
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(AppError.timeout(label, ms));
    }, ms);
  });

  try {
    return await Promise.race([fn(signal), timeout]);
  } catch (error) {
    // Check if this was an abort due to our timeout
    if (signal.aborted) {
      if (error instanceof AppError && error.isTimeout) {
        throw error;
      }
      throw AppError.timeout(label, ms, error instanceof Error ? error : undefined);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * True when the error is a timeout raised by withTimeout or mapped from the SDK.
 */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof AppError && error.isTimeout;
}
