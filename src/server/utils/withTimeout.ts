/**
 * Timeout utility for wrapping async operations
 *
 * Each external call (catalog fetch, model completion) runs under a per-attempt
 * timeout that is independent of the retry ceiling.
 */

/**
 * Raised when an operation exceeds its time budget.
 * Carries code ETIMEDOUT so the default retry classification treats it as transient.
 */
export class OperationTimeoutError extends Error {
  public readonly code = 'ETIMEDOUT';

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OperationTimeoutError';
  }
}

/**
 * Run an abortable operation with a timeout.
 *
 * The operation receives a signal that fires when the timeout elapses or when
 * `parentSignal` aborts, so the underlying request can be torn down.
 *
 * @param operation - Function performing the work; should honour the signal
 * @param timeoutMs - Timeout in milliseconds
 * @param operationName - Optional name for error messages
 * @param parentSignal - Outer cancellation signal (e.g. a batch abort)
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operationName: string = 'Operation',
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason);
  } else {
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new OperationTimeoutError(operationName, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Default timeout values for external calls (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Single language-model completion - 2 minutes */
  LLM_COMPLETION: 2 * 60 * 1000,
} as const;
