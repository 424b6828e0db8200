import { AppError } from "./app-error.js";

export type BackoffStrategy = "linear" | "exponential";

export interface RetryOptions {
  /** Total number of attempts, including the first call. Default: 3 */
  maxAttempts?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** `linear`: base * attempt. `exponential`: base * 2^(attempt-1) with jitter. Default: exponential */
  backoff?: BackoffStrategy;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each wait with the failed attempt number (1-based). */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "backoff">
> = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
  backoff: "exponential",
};

/**
 * Thrown by {@link withRetry} when every attempt failed. `cause` is the last error.
 */
export class RetryExhaustedError extends Error {
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`Gave up after ${String(attempts)} attempt(s)`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Determines whether an error is retryable.
 * Client errors (4xx) are NOT retried; server errors (5xx) and network errors ARE retried.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    // Never retry client errors (4xx)
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return error.statusCode >= 500;
  }

  // Non-AppError errors (network failures, unexpected errors) are retryable
  // unless a retryableErrors filter is specified
  if (retryableErrors && retryableErrors.length > 0) {
    const code = errorCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based).
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  backoff: BackoffStrategy,
): number {
  if (backoff === "linear") {
    return Math.min(maxDelayMs, baseDelayMs * attempt);
  }
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt - 1);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  // Jitter: random value between 50% and 100% of the capped delay
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with bounded retries.
 * Does NOT retry on 4xx (client) errors -- only 5xx and network errors.
 * A non-retryable error is rethrown as is; exhausting attempts throws {@link RetryExhaustedError}.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, backoff } = {
    ...DEFAULT_RETRY_OPTIONS,
    ...options,
  };
  const retryableErrors = options?.retryableErrors;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (!isRetryable(error, retryableErrors)) {
        throw error;
      }

      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs, backoff);
      options?.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }
}
