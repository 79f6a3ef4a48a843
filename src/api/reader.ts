import { decodeDocument, extractResults, isRecord } from '../parsers/entities.js';
import {
  buildDocumentPayload,
  buildDocumentUpdatePayload,
} from '../transformer/payloads.js';
import type {
  CreateDocumentInput,
  ListDocumentsOptions,
  RawRecord,
  ReaderDocument,
  UpdateDocumentInput,
} from '../types.js';
import { DecodeError } from '../utils/errors.js';
import type { HttpTransport } from '../utils/http.js';
import type { Logger } from '../utils/logger.js';
import type { BackoffFn } from '../utils/retry.js';
import type { Sleep } from '../utils/sleep.js';
import { PagedApiClient } from './client.js';
import { CursorPagination, type CursorState } from './pagination.js';

export const READER_BASE_URL = 'https://readwise.io/api/v3';

export type ReaderBudget = 'default';

export interface ReaderClientOptions {
  baseUrl?: string;
  transport?: HttpTransport;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
  maxRateLimitAttempts?: number;
  backoff?: BackoffFn;
  /** Pause before re-requesting a page whose body was cut short (default: 5000). */
  transientRetryDelayMs?: number;
  /** Cap on those re-requests per page; unlimited when `null` or unset. */
  maxTransientRetries?: number | null;
}

/**
 * Client for the Readwise Reader API. All endpoints share one budget of
 * 20 requests per minute.
 *
 * @see https://readwise.io/reader_api
 */
export class ReaderClient {
  readonly #api: PagedApiClient<ReaderBudget, CursorState>;

  constructor(token: string, options: ReaderClientOptions = {}) {
    this.#api = new PagedApiClient<ReaderBudget, CursorState>({
      baseUrl: options.baseUrl ?? READER_BASE_URL,
      token,
      budgets: [['default', { limit: 20, periodMs: 60_000 }]],
      pagination: new CursorPagination({
        transientRetryDelayMs: options.transientRetryDelayMs,
      }),
      transport: options.transport,
      logger: options.logger,
      sleep: options.sleep,
      now: options.now,
      maxRateLimitAttempts: options.maxRateLimitAttempts,
      backoff: options.backoff,
      maxTransientRetries: options.maxTransientRetries,
    });
  }

  /**
   * Save a URL (optionally with its HTML) to Reader. Returns the server's
   * creation response, which carries the new document's `id` and `url`.
   */
  async createDocument(input: CreateDocumentInput): Promise<RawRecord> {
    const body = await this.#api.postJson('/save/', buildDocumentPayload(input), 'default');
    return expectObject(body, '/save/');
  }

  /**
   * Documents in the library, newest first, narrowed by the given filters.
   * Highlights and notes come back as child documents with a `parentId`.
   */
  async *getDocuments(options: ListDocumentsOptions = {}): AsyncGenerator<ReaderDocument> {
    const filters = {
      location: options.location,
      category: options.category,
      updatedAfter: options.updatedAfter?.toISOString(),
      withHtmlContent: options.withHtmlContent,
    };

    for await (const page of this.#api.paginate('/list/', { budget: 'default', filters })) {
      for (const document of extractResults(page)) {
        yield decodeDocument(document);
      }
    }
  }

  /**
   * A single document, or `null` when no document has that id.
   */
  async getDocument(documentId: string): Promise<ReaderDocument | null> {
    const body = await this.#api.getJson('/list/', {
      budget: 'default',
      query: { id: documentId },
    });
    const [first] = extractResults(body);
    return first === undefined ? null : decodeDocument(first);
  }

  async updateDocument(documentId: string, input: UpdateDocumentInput): Promise<RawRecord> {
    const body = await this.#api.patchJson(
      `/update/${encodeURIComponent(documentId)}/`,
      buildDocumentUpdatePayload(input),
      'default',
    );
    return expectObject(body, '/update/');
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.#api.delete(`/delete/${encodeURIComponent(documentId)}/`, 'default');
  }
}

function expectObject(body: unknown, path: string): RawRecord {
  if (!isRecord(body)) {
    throw new DecodeError(`Expected a JSON object from "${path}"`);
  }
  return body;
}
