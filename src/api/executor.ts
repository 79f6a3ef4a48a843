import { HttpStatusError } from '../utils/errors.js';
import {
  FetchTransport,
  buildUrl,
  getHeader,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
  type QueryParams,
} from '../utils/http.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

const USER_AGENT = 'readwise-api-client/0.1';

/** Wait used when a 429 arrives without a readable `Retry-After`. */
export const DEFAULT_RETRY_AFTER_SECONDS = 60;

export interface ApiRequest {
  method: HttpMethod;
  /** Path below the base URL, e.g. `/books/`. */
  path: string;
  query?: QueryParams;
  body?: unknown;
}

export interface RequestExecutorOptions {
  baseUrl: string;
  token: string;
  /** Scheme in front of the token in `Authorization` (default: `Token`). */
  authScheme?: string;
  transport?: HttpTransport;
  sleep?: Sleep;
  now?: () => number;
  logger?: Logger;
}

/**
 * Seconds to wait according to a `Retry-After` header, which may hold
 * either a number of seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds);
  }

  const retryDate = Date.parse(value);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, Math.ceil((retryDate - now) / 1000));
  }

  return DEFAULT_RETRY_AFTER_SECONDS;
}

/**
 * Turns one API call into one completed HTTP exchange.
 *
 * A 429 is never surfaced: the executor sleeps for the server's
 * `Retry-After` and sends the identical request again, for as long as the
 * server keeps answering 429. Any other non-2xx status raises
 * `HttpStatusError` straight away.
 */
export class RequestExecutor {
  readonly #baseUrl: string;
  readonly #headers: Readonly<Record<string, string>>;
  readonly #transport: HttpTransport;
  readonly #sleep: Sleep;
  readonly #now: () => number;
  readonly #logger: Logger;

  constructor(options: RequestExecutorOptions) {
    // Strip trailing slash so callers can use paths like `/books/`
    this.#baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.#headers = {
      Accept: 'application/json',
      Authorization: `${options.authScheme ?? 'Token'} ${options.token}`,
      'User-Agent': USER_AGENT,
    };
    this.#transport = options.transport ?? new FetchTransport();
    this.#sleep = options.sleep ?? defaultSleep;
    this.#now = options.now ?? Date.now;
    this.#logger = options.logger ?? defaultLogger;
  }

  async execute(request: ApiRequest): Promise<HttpResponse> {
    const httpRequest = this.#toHttpRequest(request);

    this.#logger.debug(
      `Calling "${request.method}" on "${httpRequest.url}" with params: ${JSON.stringify(request.query ?? {})}`,
    );

    let response = await this.#transport.send(httpRequest);

    while (response.status === 429) {
      const seconds = parseRetryAfter(getHeader(response, 'Retry-After'), this.#now());
      this.#logger.warn(`Rate limited by Readwise, retrying in ${seconds} seconds`);
      await this.#sleep(seconds * 1000);
      response = await this.#transport.send(this.#toHttpRequest(request));
    }

    if (response.status < 200 || response.status >= 300) {
      throw new HttpStatusError(
        response.status,
        request.method,
        buildUrl(httpRequest.url, request.query),
        response.body,
      );
    }

    return response;
  }

  #toHttpRequest(request: ApiRequest): HttpRequest {
    const httpRequest: HttpRequest = {
      method: request.method,
      url: `${this.#baseUrl}${request.path}`,
      headers: { ...this.#headers },
    };
    if (request.query) httpRequest.query = { ...request.query };
    if (request.body !== undefined) httpRequest.body = request.body;
    return httpRequest;
  }
}
