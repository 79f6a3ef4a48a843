import {
  decodeBook,
  decodeHighlight,
  decodeTag,
  extractResults,
} from '../parsers/entities.js';
import { buildHighlightPayload } from '../transformer/payloads.js';
import type {
  Book,
  CreateHighlightInput,
  Highlight,
  ListBooksOptions,
  ListHighlightsOptions,
  Tag,
} from '../types.js';
import { HttpStatusError } from '../utils/errors.js';
import type { HttpTransport } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import type { BackoffFn } from '../utils/retry.js';
import type { Sleep } from '../utils/sleep.js';
import { PagedApiClient } from './client.js';
import { OffsetPagination } from './pagination.js';

export const LEGACY_BASE_URL = 'https://readwise.io/api/v2';

/**
 * `heavy` covers the book and highlight listings, which Readwise limits
 * to 20 requests per minute; everything else shares 240 per minute.
 */
export type LegacyBudget = 'default' | 'heavy';

export interface LegacyHighlightsClientOptions {
  baseUrl?: string;
  pageSize?: number;
  transport?: HttpTransport;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  maxRateLimitAttempts?: number;
  backoff?: BackoffFn;
}

/**
 * Client for the Readwise highlights API: books, highlights and book tags.
 *
 * Listing methods return async iterables that fetch pages lazily; each
 * call starts again from page 1.
 *
 * @see https://readwise.io/api_deets
 */
export class LegacyHighlightsClient {
  readonly #api: PagedApiClient<LegacyBudget, number>;

  constructor(token: string, options: LegacyHighlightsClientOptions = {}) {
    this.#api = new PagedApiClient<LegacyBudget, number>({
      baseUrl: options.baseUrl ?? LEGACY_BASE_URL,
      token,
      budgets: [
        ['default', { limit: 240, periodMs: 60_000 }],
        ['heavy', { limit: 20, periodMs: 60_000 }],
      ],
      pagination: new OffsetPagination({ pageSize: options.pageSize }),
      transport: options.transport,
      logger: options.logger,
      sleep: options.sleep,
      now: options.now,
      maxRateLimitAttempts: options.maxRateLimitAttempts,
      backoff: options.backoff,
    });
  }

  /**
   * Check the token against `GET /auth/`. Resolves `false` when the
   * server rejects it; other failures propagate.
   */
  async validateToken(): Promise<boolean> {
    try {
      const response = await this.#api.request('GET', '/auth/', { budget: 'default' });
      return response.status === 204 || response.status === 200;
    } catch (error: unknown) {
      if (error instanceof HttpStatusError && (error.status === 401 || error.status === 403)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Every book in the library, optionally narrowed by category and
   * update time.
   */
  async *getBooks(options: ListBooksOptions = {}): AsyncGenerator<Book> {
    const filters = {
      page_size: options.pageSize,
      category: options.category,
      updated__gt: options.updatedAfter?.toISOString(),
      updated__lt: options.updatedBefore?.toISOString(),
    };

    for await (const page of this.#api.paginate('/books/', { budget: 'heavy', filters })) {
      for (const book of extractResults(page)) {
        yield decodeBook(book);
      }
    }
  }

  async getBook(bookId: string): Promise<Book> {
    const body = await this.#api.getJson(`/books/${encodeURIComponent(bookId)}/`, {
      budget: 'default',
    });
    return decodeBook(body);
  }

  /**
   * Every highlight belonging to one book.
   */
  async *getBookHighlights(bookId: string): AsyncGenerator<Highlight> {
    yield* this.#highlights({ book_id: bookId });
  }

  /**
   * Every highlight in the library, optionally narrowed by update time.
   */
  async *getHighlights(options: ListHighlightsOptions = {}): AsyncGenerator<Highlight> {
    yield* this.#highlights({
      page_size: options.pageSize,
      updated__gt: options.updatedAfter?.toISOString(),
      updated__lt: options.updatedBefore?.toISOString(),
    });
  }

  /**
   * Create a single highlight. The book is matched (or created) by title
   * and author on the server side.
   */
  async createHighlight(input: CreateHighlightInput): Promise<void> {
    await this.#api.postJson('/highlights/', buildHighlightPayload(input), 'default');
  }

  /**
   * Tags attached to a book. This endpoint answers with a bare list.
   */
  async *getBookTags(bookId: string): AsyncGenerator<Tag> {
    const path = `/books/${encodeURIComponent(bookId)}/tags`;

    for await (const page of this.#api.paginate(path, {
      budget: 'default',
      filters: { book_id: bookId },
    })) {
      for (const tag of extractResults(page)) {
        yield decodeTag(tag);
      }
    }
  }

  async addTag(bookId: string, name: string): Promise<void> {
    await this.#api.postJson(`/books/${encodeURIComponent(bookId)}/tags/`, { name }, 'default');
  }

  async deleteTag(bookId: string, tagId: string): Promise<void> {
    await this.#api.delete(
      `/books/${encodeURIComponent(bookId)}/tags/${encodeURIComponent(tagId)}`,
      'default',
    );
  }

  async *#highlights(filters: Record<string, string | number | undefined>): AsyncGenerator<Highlight> {
    for await (const page of this.#api.paginate('/highlights/', { budget: 'heavy', filters })) {
      for (const highlight of extractResults(page)) {
        yield decodeHighlight(highlight);
      }
    }
  }
}
