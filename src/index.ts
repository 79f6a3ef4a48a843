export { LegacyHighlightsClient, LEGACY_BASE_URL } from './api/highlights.js';
export type { LegacyBudget, LegacyHighlightsClientOptions } from './api/highlights.js';
export { ReaderClient, READER_BASE_URL } from './api/reader.js';
export type { ReaderBudget, ReaderClientOptions } from './api/reader.js';
export { PagedApiClient, decodeJson } from './api/client.js';
export type { PagedApiClientOptions, PaginateOptions, RequestOptions } from './api/client.js';
export { RequestExecutor, parseRetryAfter, DEFAULT_RETRY_AFTER_SECONDS } from './api/executor.js';
export type { ApiRequest, RequestExecutorOptions } from './api/executor.js';
export {
  CursorPagination,
  OffsetPagination,
  DEFAULT_PAGE_SIZE,
  DEFAULT_TRANSIENT_RETRY_DELAY_MS,
} from './api/pagination.js';
export type { CursorState, PaginationStrategy } from './api/pagination.js';

export {
  decodeBook,
  decodeDocument,
  decodeHighlight,
  decodeReaderTags,
  decodeTag,
  extractResults,
  parseOptionalTimestamp,
  parseTimestamp,
} from './parsers/entities.js';
export {
  buildDocumentPayload,
  buildDocumentUpdatePayload,
  buildHighlightPayload,
} from './transformer/payloads.js';

export * from './utils/errors.js';
export { FetchTransport, buildUrl, getHeader } from './utils/http.js';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  QueryParams,
  QueryValue,
} from './utils/http.js';
export { RateBudgets, RateLimiter } from './utils/rate-limiter.js';
export type { BudgetSpec, RateLimiterOptions } from './utils/rate-limiter.js';
export { RetryPolicy, exponentialBackoff, DEFAULT_MAX_ATTEMPTS } from './utils/retry.js';
export type { BackoffConfig, BackoffFn, RetryPolicyOptions } from './utils/retry.js';
export { logger, setVerbose } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export type { Sleep } from './utils/sleep.js';
export { getDefaultConfig, loadConfig, mergeConfigs, resolveToken } from './utils/config.js';

export type * from './types.js';
