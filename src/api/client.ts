import { ChunkedTransferError, DecodeError } from '../utils/errors.js';
import type { HttpMethod, HttpResponse, HttpTransport, QueryParams } from '../utils/http.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { RateBudgets, type BudgetSpec } from '../utils/rate-limiter.js';
import { RetryPolicy, type BackoffFn } from '../utils/retry.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { RequestExecutor } from './executor.js';
import type { PaginationStrategy } from './pagination.js';

export interface PagedApiClientOptions<TBudget extends string, TState> {
  baseUrl: string;
  token: string;
  /** Scheme in front of the token in `Authorization` (default: `Token`). */
  authScheme?: string;
  /** One rolling-window allowance per budget class. */
  budgets: ReadonlyArray<readonly [TBudget, BudgetSpec]>;
  pagination: PaginationStrategy<TState>;
  transport?: HttpTransport;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  /** Attempts against the local rate gate before `RateLimitError` (default: 8). */
  maxRateLimitAttempts?: number;
  backoff?: BackoffFn;
  /**
   * Cap on re-requests of a page whose body was cut short. `null` or
   * undefined keeps retrying for as long as the failure persists.
   */
  maxTransientRetries?: number | null;
}

export interface RequestOptions<TBudget extends string> {
  budget: TBudget;
  query?: QueryParams;
  body?: unknown;
}

export interface PaginateOptions<TBudget extends string> {
  budget: TBudget;
  /** Merged into every page request after the paging parameters. */
  filters?: QueryParams;
}

/**
 * Generic client for one Readwise API surface.
 *
 * Every request passes the budget class's rate gate and the retry policy
 * before reaching the executor. Listing endpoints are walked with the
 * surface's pagination strategy.
 */
export class PagedApiClient<TBudget extends string, TState> {
  readonly #executor: RequestExecutor;
  readonly #budgets: RateBudgets<TBudget>;
  readonly #retry: RetryPolicy;
  readonly #pagination: PaginationStrategy<TState>;
  readonly #logger: Logger;
  readonly #sleep: Sleep;
  readonly #maxTransientRetries: number | null;

  constructor(options: PagedApiClientOptions<TBudget, TState>) {
    this.#logger = options.logger ?? defaultLogger;
    this.#sleep = options.sleep ?? defaultSleep;
    this.#executor = new RequestExecutor({
      baseUrl: options.baseUrl,
      token: options.token,
      authScheme: options.authScheme,
      transport: options.transport,
      sleep: this.#sleep,
      now: options.now,
      logger: this.#logger,
    });
    this.#budgets = new RateBudgets(options.budgets, {
      now: options.now,
      sleep: this.#sleep,
      logger: this.#logger,
    });
    this.#retry = new RetryPolicy({
      maxAttempts: options.maxRateLimitAttempts,
      backoff: options.backoff,
      sleep: this.#sleep,
      logger: this.#logger,
    });
    this.#pagination = options.pagination;
    this.#maxTransientRetries = options.maxTransientRetries ?? null;
  }

  /**
   * Send one request through the rate gate, retrying while the gate
   * refuses it.
   */
  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions<TBudget>,
  ): Promise<HttpResponse> {
    const limiter = this.#budgets.get(options.budget);

    return this.#retry.run(async () => {
      await limiter.acquire();
      return this.#executor.execute({
        method,
        path,
        query: options.query,
        body: options.body,
      });
    });
  }

  /**
   * GET `path` and return the decoded JSON body.
   */
  async getJson(
    path: string,
    options: { budget: TBudget; query?: QueryParams },
  ): Promise<unknown> {
    const response = await this.request('GET', path, options);
    return decodeJson(response, path);
  }

  async postJson(path: string, body: unknown, budget: TBudget): Promise<unknown> {
    this.#logger.debug(`Posting "${path}" with data: ${JSON.stringify(body)}`);
    const response = await this.request('POST', path, { budget, body });
    return decodeJson(response, path);
  }

  async patchJson(path: string, body: unknown, budget: TBudget): Promise<unknown> {
    const response = await this.request('PATCH', path, { budget, body });
    return decodeJson(response, path);
  }

  async delete(path: string, budget: TBudget): Promise<void> {
    this.#logger.debug(`Deleting "${path}"`);
    await this.request('DELETE', path, { budget });
  }

  /**
   * Walk a paged endpoint, yielding each decoded page body in order.
   *
   * Every call starts a fresh walk from the first page. Pages are only
   * requested as the consumer pulls them.
   */
  async *paginate(path: string, options: PaginateOptions<TBudget>): AsyncGenerator<unknown> {
    let state = this.#pagination.start();

    while (true) {
      const query: QueryParams = { ...this.#pagination.query(state) };
      for (const [key, value] of Object.entries(options.filters ?? {})) {
        if (value !== undefined) query[key] = value;
      }
      const body = await this.#fetchPage(path, query, options.budget);

      yield body;

      const next = this.#pagination.advance(body, state, this.#logger);
      if (next === null) {
        return;
      }
      state = next;
    }
  }

  async #fetchPage(path: string, query: QueryParams, budget: TBudget): Promise<unknown> {
    const delayMs = this.#pagination.transientRetryDelayMs;

    for (let retries = 0; ; retries++) {
      try {
        return await this.getJson(path, { budget, query });
      } catch (error: unknown) {
        if (!(error instanceof ChunkedTransferError) || delayMs === undefined) {
          throw error;
        }
        if (this.#maxTransientRetries !== null && retries >= this.#maxTransientRetries) {
          throw error;
        }
        this.#logger.warn(
          `Page from "${path}" arrived incomplete (${error.message}), retrying in ${delayMs}ms`,
        );
        await this.#sleep(delayMs);
      }
    }
  }
}

/**
 * Parse a response body as JSON. An empty body (204) decodes to `null`.
 */
export function decodeJson(response: HttpResponse, path: string): unknown {
  if (response.body.trim() === '') {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(response.body);
    return parsed;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DecodeError(`Response from "${path}" is not valid JSON: ${message}`);
  }
}
