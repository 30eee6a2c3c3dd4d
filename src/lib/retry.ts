import { AbuseLimitError, RateLimitError, isRetryableError } from "./errors";
import { logger } from "./logger";

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Base delay for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound for any single wait, including server-requested ones (default: 60000) */
  maxDelayMs?: number;
  /** Add up to 25% random jitter (default: false) */
  jitter?: boolean;
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_OPTIONS = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: false,
};

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff: base * 2^attempt, clamped to maxDelayMs
 */
export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter: boolean = false
): number {
  const clamped = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  if (!jitter) return clamped;
  return Math.min(Math.floor(clamped * (1 + Math.random() * 0.25)), maxDelayMs);
}

/**
 * Delay before the next attempt. A rate limit that says when it resets is
 * waited out (up to maxDelayMs) instead of guessed at.
 */
export function retryDelayFor(
  error: Error,
  attempt: number,
  opts: { baseDelayMs: number; maxDelayMs: number; jitter: boolean }
): number {
  const backoff = calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitter);

  if ((error instanceof RateLimitError || error instanceof AbuseLimitError) && error.retryAfter !== undefined) {
    return Math.min(Math.max(error.retryAfter * 1000, backoff), opts.maxDelayMs);
  }

  return backoff;
}

/**
 * Run fn, retrying retryable failures with exponential backoff
 *
 * @throws the last error once retries are exhausted or the error is not retryable
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const sleep = options.sleep ?? delay;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const shouldRetry = opts.shouldRetry
        ? opts.shouldRetry(lastError, attempt)
        : isRetryableError(lastError);

      if (attempt >= opts.maxRetries || !shouldRetry) {
        throw lastError;
      }

      const delayMs = retryDelayFor(lastError, attempt, opts);

      if (opts.onRetry) {
        opts.onRetry(lastError, attempt + 1, delayMs);
      } else {
        logger.debug(`Retry ${attempt + 1}/${opts.maxRetries} after ${delayMs}ms: ${lastError.message}`);
      }

      await sleep(delayMs);
    }
  }

  throw lastError ?? new Error("Retry failed with unknown error");
}
