/**
 * RetryHandler - bounded retry loop for opening a connection
 *
 * The attempt counter starts at 1 and the loop gives up as soon as the
 * counter reaches `maxConnectionRetries`, before doing any I/O for that
 * attempt. A limit of 5 therefore allows 4 real attempts.
 */

import type { RetryConfig } from '../../types.js';
import { DEFAULT_CONFIG } from '../../types.js';
import { isRecoverableDriverError } from '../../drivers/errors.js';

/**
 * Outcome of a retried operation
 */
export type RetryOutcome<T> =
  | { ok: true; result: T; attempts: number; totalTimeMs: number }
  | { ok: false; attempts: number; totalTimeMs: number; lastError: Error | null };

type ResolvedRetryConfig = Required<Omit<RetryConfig, 'onRetry'>> & Pick<RetryConfig, 'onRetry'>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Retry handler with optional exponential backoff
 *
 * @example
 * ```typescript
 * const handler = new RetryHandler({ maxConnectionRetries: 5 });
 *
 * const outcome = await handler.withRetry(() => driver.open(target));
 * if (!outcome.ok) {
 *   console.log(`Gave up after ${outcome.attempts} attempts`);
 * }
 * ```
 */
export class RetryHandler {
  private readonly config: ResolvedRetryConfig;

  constructor(config?: Partial<RetryConfig>) {
    this.config = {
      maxConnectionRetries: config?.maxConnectionRetries ?? DEFAULT_CONFIG.retry.maxConnectionRetries,
      initialDelayMs: config?.initialDelayMs ?? DEFAULT_CONFIG.retry.initialDelayMs,
      maxDelayMs: config?.maxDelayMs ?? DEFAULT_CONFIG.retry.maxDelayMs,
      backoffMultiplier: config?.backoffMultiplier ?? DEFAULT_CONFIG.retry.backoffMultiplier,
      jitter: config?.jitter ?? DEFAULT_CONFIG.retry.jitter,
      isRetryable: config?.isRetryable ?? isRecoverableDriverError,
      onRetry: config?.onRetry,
    };
  }

  /**
   * Run an operation until it succeeds or the attempt limit is reached
   *
   * Errors rejected by `isRetryable` are rethrown immediately.
   */
  async withRetry<T>(operation: (attempt: number) => Promise<T>): Promise<RetryOutcome<T>> {
    const startTime = Date.now();
    let lastError: Error | null = null;
    let attempt = 1;

    for (;;) {
      if (attempt >= this.config.maxConnectionRetries) {
        return {
          ok: false,
          attempts: attempt - 1,
          totalTimeMs: Date.now() - startTime,
          lastError,
        };
      }

      try {
        const result = await operation(attempt);
        return {
          ok: true,
          result,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      } catch (error) {
        lastError = toError(error);

        if (!this.config.isRetryable(lastError)) {
          throw lastError;
        }

        const delay = this.calculateDelay(attempt);
        this.config.onRetry?.(attempt, lastError, delay);

        if (delay > 0) {
          await sleep(delay);
        }
        attempt++;
      }
    }
  }

  /**
   * Delay after a failed attempt (1-indexed), in milliseconds
   */
  calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    if (this.config.jitter) {
      // between 0% and 25% extra
      const jitterFactor = 1 + Math.random() * 0.25;
      return Math.floor(cappedDelay * jitterFactor);
    }

    return Math.floor(cappedDelay);
  }

  /**
   * Check if an error is retryable
   */
  isRetryable(error: Error): boolean {
    return this.config.isRetryable(error);
  }

  /**
   * Get the current configuration
   */
  getConfig(): ResolvedRetryConfig {
    return { ...this.config };
  }

  /**
   * Number of real attempts made before giving up
   */
  getMaxAttempts(): number {
    return Math.max(this.config.maxConnectionRetries - 1, 0);
  }
}

/**
 * Create a retry handler with pre-configured options
 */
export function createRetryHandler(config?: Partial<RetryConfig>): RetryHandler {
  return new RetryHandler(config);
}
