/**
 * Exponential backoff retry
 *
 * Only RetryableError is retried; anything else (NonRetryableError, timeouts,
 * programming errors) fails on the first attempt.
 */

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Base delay in ms (default: 500) */
  baseDelayMs?: number;
  /** Delay cap in ms (default: 16000) */
  maxDelayMs?: number;
  /** Random jitter added to each delay, in ms (default: 100) */
  jitterMs?: number;
  onRetry?: (attempt: number, error: RetryableError, delayMs: number) => void;
}

/** HTTP statuses worth another attempt */
export const RETRY_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

export class RetryableError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, { cause });
    this.name = "RetryableError";
    this.statusCode = statusCode;
  }
}

export class NonRetryableError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, cause?: unknown) {
    super(message, { cause });
    this.name = "NonRetryableError";
    this.statusCode = statusCode;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * baseDelay * 2^attempt, capped, plus jitter
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterMs: number
): number {
  const exponentialDelay = baseDelayMs * 2 ** attempt;
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);
  return cappedDelay + Math.random() * jitterMs;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 500,
    maxDelayMs = 16_000,
    jitterMs = 100,
    onRetry,
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof RetryableError) || attempt >= maxRetries) {
        throw error;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);
      onRetry?.(attempt + 1, error, delayMs);
      await sleep(delayMs);
    }
  }
}
