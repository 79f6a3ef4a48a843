/**
 * Rolling-window rate limiter.
 *
 * Readwise publishes its limits per endpoint group:
 * - legacy API: 240 requests per minute, 20 per minute for the book and
 *   highlight listings
 * - Reader API: 20 requests per minute
 *
 * Each group is a separate budget class with its own limiter; admissions
 * in one class never consume credit in another.
 */

import { RateLimitExceededError } from './errors.js';
import { logger as defaultLogger, type Logger } from './logger.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

export interface RateLimiterOptions {
  /** Calls admitted per window. */
  limit: number;
  /** Window length in milliseconds. */
  periodMs: number;
  now?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

export class RateLimiter {
  readonly limit: number;
  readonly periodMs: number;
  #admitted: number[] = [];
  readonly #now: () => number;
  readonly #sleep: Sleep;
  readonly #logger: Logger;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`Rate limit must be a positive integer, got ${options.limit}`);
    }
    if (options.periodMs <= 0) {
      throw new RangeError(`Rate limit period must be positive, got ${options.periodMs}`);
    }
    this.limit = options.limit;
    this.periodMs = options.periodMs;
    this.#now = options.now ?? Date.now;
    this.#sleep = options.sleep ?? defaultSleep;
    this.#logger = options.logger ?? defaultLogger;
  }

  /**
   * Admit the call if the window has room and return 0; otherwise leave
   * the window untouched and return how long until a slot frees up.
   */
  tryAcquire(): number {
    const now = this.#now();
    this.#prune(now);

    if (this.#admitted.length < this.limit) {
      this.#admitted.push(now);
      return 0;
    }

    return Math.max(1, this.#admitted[0] + this.periodMs - now);
  }

  /**
   * Wait until the window admits this call.
   *
   * Sleeps once for the time the oldest admission needs to leave the
   * window. If another caller sharing this limiter claimed the slot in the
   * meantime, throws `RateLimitExceededError` for `RetryPolicy` to handle.
   */
  async acquire(): Promise<void> {
    const waitMs = this.tryAcquire();
    if (waitMs === 0) {
      return;
    }

    this.#logger.debug(
      `Rate budget of ${this.limit}/${this.periodMs}ms used up, waiting ${waitMs}ms`,
    );
    await this.#sleep(waitMs);

    const retryAfterMs = this.tryAcquire();
    if (retryAfterMs > 0) {
      throw new RateLimitExceededError(retryAfterMs);
    }
  }

  /**
   * Time until a call would be admitted, 0 if one would be admitted now.
   */
  waitTimeMs(): number {
    const now = this.#now();
    this.#prune(now);
    if (this.#admitted.length < this.limit) {
      return 0;
    }
    return Math.max(1, this.#admitted[0] + this.periodMs - now);
  }

  reset(): void {
    this.#admitted = [];
  }

  #prune(now: number): void {
    const cutoff = now - this.periodMs;
    let drop = 0;
    while (drop < this.#admitted.length && this.#admitted[drop] <= cutoff) {
      drop++;
    }
    if (drop > 0) {
      this.#admitted.splice(0, drop);
    }
  }
}

export interface BudgetSpec {
  limit: number;
  periodMs: number;
}

/**
 * One independent limiter per budget class.
 */
export class RateBudgets<TClass extends string> {
  readonly #limiters = new Map<TClass, RateLimiter>();

  constructor(
    specs: ReadonlyArray<readonly [TClass, BudgetSpec]>,
    shared: Pick<RateLimiterOptions, 'now' | 'sleep' | 'logger'> = {},
  ) {
    for (const [name, spec] of specs) {
      this.#limiters.set(name, new RateLimiter({ ...spec, ...shared }));
    }
  }

  get(budget: TClass): RateLimiter {
    const limiter = this.#limiters.get(budget);
    if (!limiter) {
      throw new RangeError(`Unknown rate budget "${budget}"`);
    }
    return limiter;
  }
}
