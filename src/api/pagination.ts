import { isRecord } from '../parsers/entities.js';
import type { QueryParams } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';

/**
 * How a paged endpoint walks from one page to the next.
 *
 * `TState` is whatever identifies a page: a page number, a cursor.
 */
export interface PaginationStrategy<TState> {
  /** State for the first request of a fresh walk. */
  start(): TState;
  /** Query parameters that select the page for `state`. */
  query(state: TState): QueryParams;
  /** State for the following page, or `null` when `body` was the last one. */
  advance(body: unknown, state: TState, logger: Logger): TState | null;
  /**
   * Pause before re-requesting a page whose body was cut short. Strategies
   * that leave this undefined let the failure propagate.
   */
  readonly transientRetryDelayMs?: number;
}

export const DEFAULT_PAGE_SIZE = 1000;

/**
 * `?page=N&page_size=M` paging used by the legacy API. Stops when the
 * response is a bare list or its `next` link is empty.
 */
export class OffsetPagination implements PaginationStrategy<number> {
  readonly pageSize: number;

  constructor(options: { pageSize?: number } = {}) {
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  start(): number {
    return 1;
  }

  query(page: number): QueryParams {
    return { page, page_size: this.pageSize };
  }

  advance(body: unknown, page: number): number | null {
    if (Array.isArray(body) || !isRecord(body) || !body['next']) {
      return null;
    }
    return page + 1;
  }
}

export interface CursorState {
  pageCursor?: string;
}

/** Delay before re-requesting a Reader page whose body was cut short. */
export const DEFAULT_TRANSIENT_RETRY_DELAY_MS = 5000;

/**
 * `?pageCursor=...` paging used by the Reader API. Stops when the
 * response is a bare list, `nextPageCursor` is empty, or the server hands
 * back the cursor that was just used.
 */
export class CursorPagination implements PaginationStrategy<CursorState> {
  readonly transientRetryDelayMs: number;

  constructor(options: { transientRetryDelayMs?: number } = {}) {
    this.transientRetryDelayMs = options.transientRetryDelayMs ?? DEFAULT_TRANSIENT_RETRY_DELAY_MS;
  }

  start(): CursorState {
    return {};
  }

  query(state: CursorState): QueryParams {
    return state.pageCursor ? { pageCursor: state.pageCursor } : {};
  }

  advance(body: unknown, state: CursorState, logger: Logger): CursorState | null {
    if (Array.isArray(body) || !isRecord(body)) {
      return null;
    }

    const next = body['nextPageCursor'];
    if (!next) {
      return null;
    }

    const pageCursor = String(next);
    if (pageCursor === state.pageCursor) {
      logger.warn(`Server returned cursor "${pageCursor}" again, stopping pagination`);
      return null;
    }

    return { pageCursor };
  }
}
