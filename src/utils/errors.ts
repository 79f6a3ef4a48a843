/**
 * Error types raised by the Readwise clients.
 *
 * Every error carries a machine-readable `code` and a `transient` flag so
 * callers can decide whether re-running the whole operation makes sense.
 */

export type ReadwiseErrorCode =
  | 'RATE_LIMITED'
  | 'RATE_GATE'
  | 'HTTP_ERROR'
  | 'NETWORK_ERROR'
  | 'CHUNKED_TRANSFER'
  | 'DECODE_ERROR'
  | 'CONFIG_ERROR';

export interface ReadwiseErrorOptions {
  code: ReadwiseErrorCode;
  transient?: boolean;
  cause?: unknown;
}

export class ReadwiseClientError extends Error {
  readonly code: ReadwiseErrorCode;
  readonly transient: boolean;

  constructor(message: string, options: ReadwiseErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ReadwiseClientError';
    this.code = options.code;
    this.transient = options.transient ?? false;
  }
}

/**
 * The local rate gate could not admit a call. Thrown by
 * `RateLimiter.acquire` and absorbed by `RetryPolicy`.
 */
export class RateLimitExceededError extends ReadwiseClientError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(`Local rate limit exceeded, next slot in ${retryAfterMs}ms`, {
      code: 'RATE_GATE',
      transient: true,
    });
    this.name = 'RateLimitExceededError';
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Retries against the local rate gate were exhausted.
 */
export class RateLimitError extends ReadwiseClientError {
  readonly attempts: number;

  constructor(attempts: number, cause?: unknown) {
    super(`Rate limit still exceeded after ${attempts} attempts`, {
      code: 'RATE_LIMITED',
      transient: true,
      cause,
    });
    this.name = 'RateLimitError';
    this.attempts = attempts;
  }
}

export class HttpStatusError extends ReadwiseClientError {
  readonly status: number;
  readonly method: string;
  readonly url: string;
  readonly body: string;

  constructor(status: number, method: string, url: string, body: string) {
    const excerpt = body.length > 200 ? `${body.slice(0, 200)}…` : body;
    super(
      `${method} ${url} failed with HTTP ${status}${excerpt ? `: ${excerpt}` : ''}`,
      { code: 'HTTP_ERROR', transient: status >= 500 },
    );
    this.name = 'HttpStatusError';
    this.status = status;
    this.method = method;
    this.url = url;
    this.body = body;
  }
}

export class NetworkError extends ReadwiseClientError {
  constructor(url: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Network error calling ${url}: ${message}`, {
      code: 'NETWORK_ERROR',
      transient: true,
      cause,
    });
    this.name = 'NetworkError';
  }
}

/**
 * The connection dropped while the response body was streaming in.
 */
export class ChunkedTransferError extends ReadwiseClientError {
  constructor(url: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Response body from ${url} was cut short: ${message}`, {
      code: 'CHUNKED_TRANSFER',
      transient: true,
      cause,
    });
    this.name = 'ChunkedTransferError';
  }
}

export class DecodeError extends ReadwiseClientError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(field ? `${message} (field "${field}")` : message, { code: 'DECODE_ERROR' });
    this.name = 'DecodeError';
    this.field = field;
  }
}

export class ConfigError extends ReadwiseClientError {
  constructor(message: string) {
    super(message, { code: 'CONFIG_ERROR' });
    this.name = 'ConfigError';
  }
}
