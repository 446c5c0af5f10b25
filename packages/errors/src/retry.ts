export type AttemptOutcome<T, E> =
  | { kind: "success"; value: T }
  | { kind: "retryable"; error: E }
  | { kind: "fatal"; error: E };

export type RetryResult<T, E> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: E; attempts: number };

export interface RetryEvent<E> {
  /** Zero-based number of the attempt that just failed. */
  attempt: number;
  error: E;
  delayMs: number;
}

export interface RetryOptions<E> {
  /** Maximum number of retry attempts after the first. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. 0 disables waiting. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Called before waiting for the next attempt. */
  onRetry?: (event: RetryEvent<E>) => void;
}

const DEFAULT_RETRY_OPTIONS = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
export function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `attempt` until it succeeds, reports a fatal outcome, or `maxRetries + 1`
 * attempts have been made. Never throws on its own: exceptions raised by
 * `attempt` propagate unchanged, every other failure is returned.
 */
export async function withRetry<T, E>(
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T, E>>,
  options?: RetryOptions<E>,
): Promise<RetryResult<T, E>> {
  const { maxRetries, baseDelayMs, maxDelayMs } = {
    maxRetries: options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    baseDelayMs: options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs,
    maxDelayMs: options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs,
  };

  for (let attemptNumber = 0; ; attemptNumber++) {
    const outcome = await attempt(attemptNumber);

    switch (outcome.kind) {
      case "success":
        return { ok: true, value: outcome.value, attempts: attemptNumber + 1 };
      case "fatal":
        return { ok: false, error: outcome.error, attempts: attemptNumber + 1 };
      case "retryable": {
        if (attemptNumber >= maxRetries) {
          return { ok: false, error: outcome.error, attempts: attemptNumber + 1 };
        }

        const delayMs = baseDelayMs > 0 ? calculateDelay(attemptNumber, baseDelayMs, maxDelayMs) : 0;
        options?.onRetry?.({ attempt: attemptNumber, error: outcome.error, delayMs });
        if (delayMs > 0) {
          await sleep(delayMs);
        }
      }
    }
  }
}
