/**
 * Cancellation outcome detection.
 */

const CANCELLATION_ERROR_NAMES = new Set(['AbortError', 'TimeoutError']);

/**
 * Check if a failure is a cancellation outcome.
 *
 * True when the failure is the abort reason of the given signal, or an error
 * named `AbortError` or `TimeoutError` (what `signal.throwIfAborted()` throws
 * for `abort()` and `AbortSignal.timeout()`).
 *
 * @example
 * ```typescript
 * try {
 *   await mediator.send(new ExportReport(), controller.signal);
 * } catch (error) {
 *   if (isCancellation(error, controller.signal)) {
 *     return;
 *   }
 *   throw error;
 * }
 * ```
 */
export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && error === signal.reason) {
    return true;
  }
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    typeof error.name === 'string' &&
    CANCELLATION_ERROR_NAMES.has(error.name)
  );
}
