import { RateLimitError, RateLimitExceededError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

/**
 * Delay before the retry that follows the zero-based `attempt`.
 */
export type BackoffFn = (attempt: number) => number;

/**
 * Configuration for exponential backoff.
 */
export interface BackoffConfig {
  /** Delay in milliseconds before the first retry (default: 1000). */
  initialDelayMs: number;
  /** Maximum delay in milliseconds between retries (default: 60000). */
  maxDelayMs: number;
  /** Spread each delay by +/-25% (default: true). */
  jitter: boolean;
}

const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  jitter: true,
};

/**
 * Exponential backoff: initialDelay * 2^attempt, optionally jittered,
 * clamped to `maxDelayMs`.
 */
export function exponentialBackoff(config: Partial<BackoffConfig> = {}): BackoffFn {
  const { initialDelayMs, maxDelayMs, jitter } = { ...DEFAULT_BACKOFF_CONFIG, ...config };

  return (attempt: number): number => {
    const exponentialDelay = initialDelayMs * Math.pow(2, attempt);
    const spread = jitter ? exponentialDelay * 0.25 * (Math.random() * 2 - 1) : 0;
    return Math.min(Math.round(exponentialDelay + spread), maxDelayMs);
  };
}

export interface RetryPolicyOptions {
  /** Total attempts including the first (default: 8). */
  maxAttempts?: number;
  backoff?: BackoffFn;
  sleep?: Sleep;
  logger?: Logger;
}

export const DEFAULT_MAX_ATTEMPTS = 8;

/**
 * Retries a call while the local rate gate keeps refusing it.
 *
 * Only `RateLimitExceededError` is retried. Every other error, including
 * HTTP failures, propagates on the first attempt. When the attempts run
 * out the caller gets a `RateLimitError`, never a dropped request.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly #backoff: BackoffFn;
  readonly #sleep: Sleep;
  readonly #logger: Logger;

  constructor(options: RetryPolicyOptions = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    this.maxAttempts = maxAttempts;
    this.#backoff = options.backoff ?? exponentialBackoff();
    this.#sleep = options.sleep ?? defaultSleep;
    this.#logger = options.logger ?? defaultLogger;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    let lastSignal: RateLimitExceededError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error: unknown) {
        if (!(error instanceof RateLimitExceededError)) {
          throw error;
        }
        lastSignal = error;

        if (attempt < this.maxAttempts - 1) {
          const delay = Math.max(this.#backoff(attempt), error.retryAfterMs);
          this.#logger.debug(
            `Rate gate refused call (attempt ${attempt + 1}/${this.maxAttempts}), backing off ${delay}ms`,
          );
          await this.#sleep(delay);
        }
      }
    }

    throw new RateLimitError(this.maxAttempts, lastSignal);
  }
}
