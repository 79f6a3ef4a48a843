import { describe, it, expect } from 'vitest';
import {
  decodeBook,
  decodeDocument,
  decodeHighlight,
  decodeReaderTags,
  decodeTag,
  extractResults,
  parseOptionalTimestamp,
  parseTimestamp,
} from '../parsers/entities.js';
import { DecodeError } from '../utils/errors.js';

const rawBook = {
  id: 1,
  title: 'Test Book',
  author: 'Test Author',
  category: 'books',
  source: 'kindle',
  num_highlights: 1,
  last_highlight_at: '2020-01-01T00:00:00Z',
  updated: '2020-01-02T10:30:00Z',
  cover_image_url: 'https://example.com/image.jpg',
  highlights_url: 'https://example.com/highlights',
  source_url: 'https://example.com/source',
  asin: 'test_asin',
  tags: [
    { id: 1, name: 'test_tag' },
    { id: 2, name: 'test_tag_2' },
  ],
  document_note: 'test_note',
};

const rawHighlight = {
  id: 10,
  text: 'Test Highlight',
  note: 'Test Note',
  location: 1,
  location_type: 'page',
  url: 'https://example.com/highlight',
  color: 'yellow',
  highlighted_at: '2020-01-01T00:00:00Z',
  updated: '2020-01-01T00:00:00Z',
  book_id: 1,
  tags: [{ id: 5, name: 'favorite' }],
};

const rawDocument = {
  id: '01gwfvp9pyaabcdgmx14f6ha0',
  url: 'https://read.readwise.io/new/read/01gwfvp9pyaabcdgmx14f6ha0',
  source_url: 'https://example.com/article',
  title: 'An Article',
  author: 'A Writer',
  source: 'Reader RSS',
  category: 'article',
  location: 'later',
  tags: {
    research: { name: 'research', type: 'manual', created: 1680000000000 },
  },
  site_name: 'Example',
  word_count: 1200,
  created_at: '2023-03-26T21:02:51.618751+00:00',
  updated_at: '2023-03-27T08:00:00.000000+00:00',
  notes: '',
  published_date: '2023-03-20',
  summary: 'A summary.',
  image_url: 'https://example.com/cover.png',
  parent_id: null,
  reading_progress: 0.25,
};

describe('timestamps', () => {
  it('should parse ISO-8601 strings', () => {
    expect(parseTimestamp('2020-01-01T00:00:00Z', 'x').toISOString()).toBe('2020-01-01T00:00:00.000Z');
    expect(parseTimestamp('2020-01-01T02:00:00+02:00', 'x').toISOString()).toBe(
      '2020-01-01T00:00:00.000Z',
    );
  });

  it('should reject malformed timestamps', () => {
    expect(() => parseTimestamp('yesterday', 'created_at')).toThrow(DecodeError);
    expect(() => parseTimestamp(12, 'created_at')).toThrow('field "created_at"');
    expect(() => parseTimestamp('2020-13-45T00:00:00Z', 'created_at')).toThrow(DecodeError);
  });

  it('should decode absent optional timestamps to null', () => {
    expect(parseOptionalTimestamp(null, 'x')).toBeNull();
    expect(parseOptionalTimestamp(undefined, 'x')).toBeNull();
    expect(parseOptionalTimestamp('', 'x')).toBeNull();
  });
});

describe('decode-tag', () => {
  it('should stringify numeric ids', () => {
    expect(decodeTag({ id: 1, name: 'test_tag' })).toEqual({ id: '1', name: 'test_tag' });
  });

  it('should reject a tag without a name', () => {
    expect(() => decodeTag({ id: 1 })).toThrow(DecodeError);
  });
});

describe('decode-book', () => {
  it('should decode every field', () => {
    const book = decodeBook(rawBook);

    expect(book.id).toBe('1');
    expect(book.title).toBe('Test Book');
    expect(book.author).toBe('Test Author');
    expect(book.category).toBe('books');
    expect(book.source).toBe('kindle');
    expect(book.numHighlights).toBe(1);
    expect(book.lastHighlightAt?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
    expect(book.updated?.toISOString()).toBe('2020-01-02T10:30:00.000Z');
    expect(book.coverImageUrl).toBe('https://example.com/image.jpg');
    expect(book.highlightsUrl).toBe('https://example.com/highlights');
    expect(book.sourceUrl).toBe('https://example.com/source');
    expect(book.asin).toBe('test_asin');
    expect(book.tags).toEqual([
      { id: '1', name: 'test_tag' },
      { id: '2', name: 'test_tag_2' },
    ]);
    expect(book.documentNote).toBe('test_note');
  });

  it('should decode a never-highlighted book to a null timestamp', () => {
    const book = decodeBook({ ...rawBook, last_highlight_at: null, updated: null, asin: null });

    expect(book.lastHighlightAt).toBeNull();
    expect(book.updated).toBeNull();
    expect(book.asin).toBeNull();
  });

  it('should reject a non-integer highlight count', () => {
    expect(() => decodeBook({ ...rawBook, num_highlights: '1' })).toThrow('field "num_highlights"');
  });
});

describe('decode-highlight', () => {
  it('should decode every field', () => {
    const highlight = decodeHighlight(rawHighlight);

    expect(highlight).toEqual({
      id: '10',
      text: 'Test Highlight',
      note: 'Test Note',
      location: 1,
      locationType: 'page',
      url: 'https://example.com/highlight',
      color: 'yellow',
      highlightedAt: new Date('2020-01-01T00:00:00.000Z'),
      updated: new Date('2020-01-01T00:00:00.000Z'),
      bookId: '1',
      tags: [{ id: '5', name: 'favorite' }],
    });
  });

  it('should keep a missing url as null', () => {
    const highlight = decodeHighlight({ ...rawHighlight, url: null, updated: null });
    expect(highlight.url).toBeNull();
    expect(highlight.updated).toBeNull();
  });
});

describe('decode-document', () => {
  it('should decode every field', () => {
    const document = decodeDocument(rawDocument);

    expect(document.id).toBe('01gwfvp9pyaabcdgmx14f6ha0');
    expect(document.sourceUrl).toBe('https://example.com/article');
    expect(document.location).toBe('later');
    expect(document.tags).toEqual({
      research: { name: 'research', type: 'manual', created: 1680000000000 },
    });
    expect(document.siteName).toBe('Example');
    expect(document.wordCount).toBe(1200);
    expect(document.createdAt.toISOString()).toBe('2023-03-26T21:02:51.618Z');
    expect(document.updatedAt.toISOString()).toBe('2023-03-27T08:00:00.000Z');
    expect(document.notes).toBe('');
    expect(document.publishedDate?.toISOString()).toBe('2023-03-20T00:00:00.000Z');
    expect(document.parentId).toBeNull();
    expect(document.readingProgress).toBe(0.25);
  });

  it('should decode a child highlight with a parent and no location', () => {
    const document = decodeDocument({
      ...rawDocument,
      category: 'highlight',
      location: null,
      parent_id: '01parent',
      tags: null,
      word_count: null,
      published_date: null,
    });

    expect(document.location).toBeNull();
    expect(document.parentId).toBe('01parent');
    expect(document.tags).toEqual({});
    expect(document.wordCount).toBeNull();
    expect(document.publishedDate).toBeNull();
  });

  it('should read a published date sent as epoch milliseconds', () => {
    const document = decodeDocument({ ...rawDocument, published_date: 1679270400000 });
    expect(document.publishedDate?.toISOString()).toBe('2023-03-20T00:00:00.000Z');
  });

  it('should reject a malformed created_at', () => {
    expect(() => decodeDocument({ ...rawDocument, created_at: 'not a date' })).toThrow(
      'field "created_at"',
    );
  });

  it('should reject an unknown location', () => {
    expect(() => decodeDocument({ ...rawDocument, location: 'shortlist' })).toThrow(DecodeError);
  });
});

describe('decode-reader-tags', () => {
  it('should treat an empty list as no tags', () => {
    expect(decodeReaderTags([])).toEqual({});
  });

  it('should fall back to the key when a tag has no name', () => {
    expect(decodeReaderTags({ later: {} })).toEqual({
      later: { name: 'later', type: null, created: null },
    });
  });
});

describe('extract-results', () => {
  it('should accept a bare list or an envelope', () => {
    expect(extractResults([1, 2])).toEqual([1, 2]);
    expect(extractResults({ results: [3], next: null })).toEqual([3]);
  });

  it('should reject anything else', () => {
    expect(() => extractResults({ next: null })).toThrow(DecodeError);
    expect(() => extractResults('nope')).toThrow(DecodeError);
  });
});
