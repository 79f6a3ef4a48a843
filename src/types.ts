// ─── Shared records ───

export interface Tag {
  id: string;
  name: string;
}

export type BookCategory = 'books' | 'articles' | 'tweets' | 'supplementals' | 'podcasts';

// ─── Legacy highlights API (v2) ───

export interface Book {
  id: string;
  title: string;
  author: string;
  category: string;
  source: string;
  numHighlights: number;
  /** `null` when the book has never been highlighted. */
  lastHighlightAt: Date | null;
  updated: Date | null;
  coverImageUrl: string;
  highlightsUrl: string;
  sourceUrl: string | null;
  asin: string | null;
  tags: Tag[];
  documentNote: string | null;
}

export interface Highlight {
  id: string;
  text: string;
  note: string | null;
  location: number;
  locationType: string;
  url: string | null;
  color: string | null;
  highlightedAt: Date | null;
  updated: Date | null;
  bookId: string;
  tags: Tag[];
}

export interface ListBooksOptions {
  category?: BookCategory;
  pageSize?: number;
  updatedAfter?: Date;
  updatedBefore?: Date;
}

export interface ListHighlightsOptions {
  pageSize?: number;
  updatedAfter?: Date;
  updatedBefore?: Date;
}

export interface CreateHighlightInput {
  text: string;
  title: string;
  author?: string;
  highlightedAt?: Date;
  sourceUrl?: string;
  /** Defaults to `"articles"`. */
  category?: BookCategory;
  note?: string;
}

// ─── Reader API (v3) ───

export type DocumentLocation = 'new' | 'later' | 'archive' | 'feed';

export type DocumentCategory =
  | 'article'
  | 'email'
  | 'rss'
  | 'highlight'
  | 'note'
  | 'pdf'
  | 'epub'
  | 'tweet'
  | 'video';

export interface ReaderTagInfo {
  name: string;
  type: string | null;
  /** Milliseconds since the epoch, as sent by the server. */
  created: number | null;
}

export interface ReaderDocument {
  id: string;
  url: string;
  sourceUrl: string | null;
  title: string | null;
  author: string | null;
  source: string | null;
  category: string;
  /** `null` for child documents such as highlights and notes. */
  location: DocumentLocation | null;
  tags: Record<string, ReaderTagInfo>;
  siteName: string | null;
  wordCount: number | null;
  createdAt: Date;
  updatedAt: Date;
  notes: string | null;
  publishedDate: Date | null;
  summary: string | null;
  imageUrl: string | null;
  /** Set on highlights and notes, pointing at the document they belong to. */
  parentId: string | null;
  /** Between 0 and 1. */
  readingProgress: number;
}

export interface ListDocumentsOptions {
  location?: DocumentLocation;
  category?: DocumentCategory;
  updatedAfter?: Date;
  withHtmlContent?: boolean;
}

export interface CreateDocumentInput {
  url: string;
  html?: string;
  shouldCleanHtml?: boolean;
  title?: string;
  author?: string;
  summary?: string;
  publishedAt?: Date;
  imageUrl?: string;
  /** Defaults to `"new"`. */
  location?: DocumentLocation;
  savedUsing?: string;
  /** Defaults to no tags. */
  tags?: string[];
}

export interface UpdateDocumentInput {
  title?: string;
  author?: string;
  summary?: string;
  publishedDate?: Date;
  imageUrl?: string;
  location?: DocumentLocation;
  category?: DocumentCategory;
}

/** A decoded JSON object as returned by the server, unvalidated. */
export type RawRecord = Record<string, unknown>;

// ─── Configuration ───

export interface ClientConfig {
  /** API token; falls back to `READWISE_TOKEN`. */
  token?: string;
  legacyBaseUrl: string;
  readerBaseUrl: string;
  pageSize: number;
  /** Attempts against the local rate gate before giving up. */
  maxRateLimitAttempts: number;
  /** Pause before re-requesting a Reader page whose body was cut short. */
  transientRetryDelayMs: number;
  /** Cap on those re-requests per page; `null` retries indefinitely. */
  maxTransientRetries: number | null;
  verbose: boolean;
}
