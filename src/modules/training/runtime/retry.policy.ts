/**
 * Retry and timeout helpers for execution backend calls.
 */

export class ExecutionTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Execution exceeded ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/** Exponential backoff: base, 2·base, 4·base … capped. attempt is 1-based. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.baseDelayMs * 2 ** Math.max(attempt - 1, 0);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Races fn against a timer. On timeout the controller is aborted so the
 * callee can tear down whatever it started, and the promise rejects with
 * ExecutionTimeoutError.
 */
export async function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  controller: AbortController = new AbortController()
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new ExecutionTimeoutError(timeoutMs));
    }, timeoutMs);

    fn(controller.signal)
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}
