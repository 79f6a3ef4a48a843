/**
 * Decoders from the JSON the Readwise APIs send to the typed records.
 *
 * These functions are pure: they never fetch, log or mutate their input.
 * Anything that does not match the expected shape raises `DecodeError`
 * naming the offending field.
 */

import type {
  Book,
  DocumentLocation,
  Highlight,
  RawRecord,
  ReaderDocument,
  ReaderTagInfo,
  Tag,
} from '../types.js';
import { DecodeError } from '../utils/errors.js';

const ISO_8601 =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

const DOCUMENT_LOCATIONS: readonly DocumentLocation[] = ['new', 'later', 'archive', 'feed'];

// ── Primitive readers ───────────────────────────────────────────────

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, what: string): RawRecord {
  if (!isRecord(value)) {
    throw new DecodeError(`Expected ${what} to be an object, got ${describe(value)}`);
  }
  return value;
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function readString(raw: RawRecord, field: string): string {
  const value = raw[field];
  if (typeof value !== 'string') {
    throw new DecodeError(`Expected a string, got ${describe(value)}`, field);
  }
  return value;
}

function readNullableString(raw: RawRecord, field: string): string | null {
  const value = raw[field];
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== 'string') {
    throw new DecodeError(`Expected a string or null, got ${describe(value)}`, field);
  }
  return value;
}

/** IDs arrive as numbers on the legacy API and strings on Reader. */
function readId(raw: RawRecord, field: string): string {
  const value = raw[field];
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  throw new DecodeError(`Expected an id, got ${describe(value)}`, field);
}

function readNullableId(raw: RawRecord, field: string): string | null {
  const value = raw[field];
  if (value === null || value === undefined || value === '') {
    return null;
  }
  return readId(raw, field);
}

function readInteger(raw: RawRecord, field: string): number {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new DecodeError(`Expected an integer, got ${describe(value)}`, field);
  }
  return value;
}

function readNullableInteger(raw: RawRecord, field: string): number | null {
  const value = raw[field];
  if (value === null || value === undefined) {
    return null;
  }
  return readInteger(raw, field);
}

function readNumber(raw: RawRecord, field: string): number {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DecodeError(`Expected a number, got ${describe(value)}`, field);
  }
  return value;
}

function readArray(raw: RawRecord, field: string): unknown[] {
  const value = raw[field];
  if (value === null || value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DecodeError(`Expected an array, got ${describe(value)}`, field);
  }
  return value;
}

// ── Timestamps ──────────────────────────────────────────────────────

/**
 * Parse an ISO-8601 timestamp. Anything else is a `DecodeError`.
 */
export function parseTimestamp(value: unknown, field: string): Date {
  if (typeof value !== 'string' || !ISO_8601.test(value)) {
    throw new DecodeError(`Expected an ISO-8601 timestamp, got ${JSON.stringify(value)}`, field);
  }
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    throw new DecodeError(`Invalid timestamp ${JSON.stringify(value)}`, field);
  }
  return new Date(millis);
}

/**
 * Like `parseTimestamp`, but `null`, a missing value and the empty
 * string decode to `null` without any parsing.
 */
export function parseOptionalTimestamp(value: unknown, field: string): Date | null {
  if (value === null || value === undefined || value === '') {
    return null;
  }
  return parseTimestamp(value, field);
}

// ── Page envelopes ──────────────────────────────────────────────────

/**
 * The records on one page: the page itself when the endpoint answers
 * with a bare list, otherwise its `results` array.
 */
export function extractResults(page: unknown): unknown[] {
  if (Array.isArray(page)) {
    return page;
  }
  const envelope = expectRecord(page, 'page');
  const results = envelope['results'];
  if (!Array.isArray(results)) {
    throw new DecodeError(`Expected a results array, got ${describe(results)}`, 'results');
  }
  return results;
}

// ── Entities ────────────────────────────────────────────────────────

export function decodeTag(value: unknown): Tag {
  const raw = expectRecord(value, 'tag');
  return {
    id: readId(raw, 'id'),
    name: readString(raw, 'name'),
  };
}

function decodeTagList(raw: RawRecord): Tag[] {
  return readArray(raw, 'tags').map(decodeTag);
}

export function decodeBook(value: unknown): Book {
  const raw = expectRecord(value, 'book');
  return {
    id: readId(raw, 'id'),
    title: readString(raw, 'title'),
    author: readNullableString(raw, 'author') ?? '',
    category: readString(raw, 'category'),
    source: readNullableString(raw, 'source') ?? '',
    numHighlights: readInteger(raw, 'num_highlights'),
    lastHighlightAt: parseOptionalTimestamp(raw['last_highlight_at'], 'last_highlight_at'),
    updated: parseOptionalTimestamp(raw['updated'], 'updated'),
    coverImageUrl: readNullableString(raw, 'cover_image_url') ?? '',
    highlightsUrl: readNullableString(raw, 'highlights_url') ?? '',
    sourceUrl: readNullableString(raw, 'source_url'),
    asin: readNullableString(raw, 'asin'),
    tags: decodeTagList(raw),
    documentNote: readNullableString(raw, 'document_note'),
  };
}

export function decodeHighlight(value: unknown): Highlight {
  const raw = expectRecord(value, 'highlight');
  return {
    id: readId(raw, 'id'),
    text: readString(raw, 'text'),
    note: readNullableString(raw, 'note'),
    location: readInteger(raw, 'location'),
    locationType: readString(raw, 'location_type'),
    url: readNullableString(raw, 'url'),
    color: readNullableString(raw, 'color'),
    highlightedAt: parseOptionalTimestamp(raw['highlighted_at'], 'highlighted_at'),
    updated: parseOptionalTimestamp(raw['updated'], 'updated'),
    bookId: readId(raw, 'book_id'),
    tags: decodeTagList(raw),
  };
}

/**
 * Reader sends tags as an object keyed by tag name. Untagged documents
 * may carry `null` or an empty list instead.
 */
export function decodeReaderTags(value: unknown): Record<string, ReaderTagInfo> {
  if (value === null || value === undefined) {
    return {};
  }
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return {};
    }
    throw new DecodeError('Expected tags to be keyed by name, got a non-empty array', 'tags');
  }

  const raw = expectRecord(value, 'tags');
  const tags: Record<string, ReaderTagInfo> = {};
  for (const [key, info] of Object.entries(raw)) {
    const entry = expectRecord(info, `tag "${key}"`);
    tags[key] = {
      name: readNullableString(entry, 'name') ?? key,
      type: readNullableString(entry, 'type'),
      created: entry['created'] === null || entry['created'] === undefined
        ? null
        : readNumber(entry, 'created'),
    };
  }
  return tags;
}

function decodeLocation(raw: RawRecord): DocumentLocation | null {
  const value = readNullableString(raw, 'location');
  if (value === null) {
    return null;
  }
  const location = DOCUMENT_LOCATIONS.find((candidate) => candidate === value);
  if (!location) {
    throw new DecodeError(`Unknown document location "${value}"`, 'location');
  }
  return location;
}

/** `published_date` is an ISO date string on most documents, epoch millis on some. */
function decodePublishedDate(raw: RawRecord): Date | null {
  const value = raw['published_date'];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value);
  }
  return parseOptionalTimestamp(value, 'published_date');
}

export function decodeDocument(value: unknown): ReaderDocument {
  const raw = expectRecord(value, 'document');
  return {
    id: readId(raw, 'id'),
    url: readString(raw, 'url'),
    sourceUrl: readNullableString(raw, 'source_url'),
    title: readNullableString(raw, 'title'),
    author: readNullableString(raw, 'author'),
    source: readNullableString(raw, 'source'),
    category: readString(raw, 'category'),
    location: decodeLocation(raw),
    tags: decodeReaderTags(raw['tags']),
    siteName: readNullableString(raw, 'site_name'),
    wordCount: readNullableInteger(raw, 'word_count'),
    createdAt: parseTimestamp(raw['created_at'], 'created_at'),
    updatedAt: parseTimestamp(raw['updated_at'], 'updated_at'),
    notes: readNullableString(raw, 'notes'),
    publishedDate: decodePublishedDate(raw),
    summary: readNullableString(raw, 'summary'),
    imageUrl: readNullableString(raw, 'image_url'),
    parentId: readNullableId(raw, 'parent_id'),
    readingProgress: readNumber(raw, 'reading_progress'),
  };
}
