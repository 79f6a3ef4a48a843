import { describe, it, expect } from 'vitest';
import { PagedApiClient } from '../api/client.js';
import { CursorPagination, OffsetPagination, type CursorState } from '../api/pagination.js';
import { ChunkedTransferError, DecodeError } from '../utils/errors.js';
import { FakeTransport, createClock, createTestLogger } from './helpers/fake-transport.js';

async function collect<T>(pages: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const page of pages) {
    out.push(page);
  }
  return out;
}

function offsetClient(options: { pageSize?: number } = {}) {
  const transport = new FakeTransport();
  const clock = createClock();
  const logger = createTestLogger();
  const client = new PagedApiClient<'default', number>({
    baseUrl: 'https://api.example.com/v2',
    token: 'test-token',
    budgets: [['default', { limit: 100, periodMs: 60_000 }]],
    pagination: new OffsetPagination(options),
    transport,
    logger,
    sleep: clock.sleep,
    now: clock.now,
  });
  return { transport, clock, logger, client };
}

function cursorClient(options: { maxTransientRetries?: number } = {}) {
  const transport = new FakeTransport();
  const clock = createClock();
  const logger = createTestLogger();
  const client = new PagedApiClient<'default', CursorState>({
    baseUrl: 'https://api.example.com/v3',
    token: 'test-token',
    budgets: [['default', { limit: 100, periodMs: 60_000 }]],
    pagination: new CursorPagination(),
    transport,
    logger,
    sleep: clock.sleep,
    now: clock.now,
    maxTransientRetries: options.maxTransientRetries,
  });
  return { transport, clock, logger, client };
}

describe('offset-pagination', () => {
  const strategy = new OffsetPagination();

  it('should start on page 1 with the default page size', () => {
    expect(strategy.start()).toBe(1);
    expect(strategy.query(2)).toEqual({ page: 2, page_size: 1000 });
    expect(new OffsetPagination({ pageSize: 50 }).query(1)).toEqual({ page: 1, page_size: 50 });
  });

  it('should advance while next is set', () => {
    expect(strategy.advance({ results: [], next: 'https://x/?page=3' }, 2)).toBe(3);
    expect(strategy.advance({ results: [], next: null }, 2)).toBeNull();
    expect(strategy.advance({ results: [] }, 2)).toBeNull();
  });

  it('should stop on a bare list', () => {
    expect(strategy.advance([{ id: 1 }], 1)).toBeNull();
  });
});

describe('cursor-pagination', () => {
  const strategy = new CursorPagination();

  it('should start without a cursor', () => {
    expect(strategy.query(strategy.start())).toEqual({});
    expect(strategy.query({ pageCursor: 'abc' })).toEqual({ pageCursor: 'abc' });
    expect(strategy.transientRetryDelayMs).toBe(5000);
  });

  it('should follow nextPageCursor until it is empty', () => {
    const logger = createTestLogger();
    expect(strategy.advance({ results: [], nextPageCursor: 'abc' }, {}, logger)).toEqual({
      pageCursor: 'abc',
    });
    expect(strategy.advance({ results: [], nextPageCursor: null }, { pageCursor: 'abc' }, logger)).toBeNull();
    expect(strategy.advance([], {}, logger)).toBeNull();
  });

  it('should stop when the server repeats the cursor', () => {
    const logger = createTestLogger();
    expect(strategy.advance({ results: [], nextPageCursor: 'abc' }, { pageCursor: 'abc' }, logger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe('paged-api-client', () => {
  it('should yield exactly two pages in order and stop', async () => {
    const { transport, client } = offsetClient();
    const page1 = { next: 'https://api.example.com/v2/books/?page=2', results: [{ id: 1 }] };
    const page2 = { next: null, results: [{ id: 2 }] };
    transport.replyJson(page1).replyJson(page2);

    const pages = await collect(
      client.paginate('/books/', { budget: 'default', filters: { category: 'books' } }),
    );

    expect(pages).toEqual([page1, page2]);
    expect(transport.requests).toHaveLength(2);
    expect(transport.requests[0].query).toEqual({ page: 1, page_size: 1000, category: 'books' });
    expect(transport.requests[1].query).toEqual({ page: 2, page_size: 1000, category: 'books' });
  });

  it('should yield a single empty page for an empty listing', async () => {
    const { transport, client } = offsetClient();
    transport.replyJson({ results: [], next: null });

    const pages = await collect(client.paginate('/books/', { budget: 'default' }));

    expect(pages).toEqual([{ results: [], next: null }]);
  });

  it('should let filters override the page size but ignore undefined ones', async () => {
    const { transport, client } = offsetClient();
    transport.replyJson({ results: [], next: null }).replyJson({ results: [], next: null });

    await collect(client.paginate('/a/', { budget: 'default', filters: { page_size: 10 } }));
    await collect(client.paginate('/a/', { budget: 'default', filters: { page_size: undefined } }));

    expect(transport.requests[0].query).toEqual({ page: 1, page_size: 10 });
    expect(transport.requests[1].query).toEqual({ page: 1, page_size: 1000 });
  });

  it('should start a fresh walk on every call', async () => {
    const { transport, client } = offsetClient();
    transport
      .replyJson({ results: [], next: 'more' })
      .replyJson({ results: [], next: null })
      .replyJson({ results: [], next: null });

    await collect(client.paginate('/books/', { budget: 'default' }));
    await collect(client.paginate('/books/', { budget: 'default' }));

    expect(transport.requests.map((r) => r.query?.['page'])).toEqual([1, 2, 1]);
  });

  it('should only request pages as they are consumed', async () => {
    const { transport, client } = offsetClient();
    transport.replyJson({ results: [1], next: 'more' }).replyJson({ results: [2], next: null });

    const pages = client.paginate('/books/', { budget: 'default' });
    await pages.next();

    expect(transport.requests).toHaveLength(1);
    expect(transport.pending).toBe(1);
  });

  it('should stop a cursor walk when the cursor repeats', async () => {
    const { transport, client, logger } = cursorClient();
    transport
      .replyJson({ results: [{ id: 'a' }], nextPageCursor: 'c1' })
      .replyJson({ results: [{ id: 'b' }], nextPageCursor: 'c1' });

    const pages = await collect(client.paginate('/list/', { budget: 'default' }));

    expect(pages).toHaveLength(2);
    expect(transport.requests).toHaveLength(2);
    expect(transport.requests[0].query).toEqual({});
    expect(transport.requests[1].query).toEqual({ pageCursor: 'c1' });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should re-request a cursor page whose body was cut short', async () => {
    const { transport, client, clock } = cursorClient();
    transport
      .replyJson({ results: [], nextPageCursor: 'c1' })
      .fail(new ChunkedTransferError('https://api.example.com/v3/list/', new Error('terminated')))
      .fail(new ChunkedTransferError('https://api.example.com/v3/list/', new Error('terminated')))
      .replyJson({ results: [{ id: 'b' }], nextPageCursor: null });

    const pages = await collect(client.paginate('/list/', { budget: 'default' }));

    expect(pages).toEqual([
      { results: [], nextPageCursor: 'c1' },
      { results: [{ id: 'b' }], nextPageCursor: null },
    ]);
    expect(clock.sleeps).toEqual([5000, 5000]);
    expect(transport.requests.map((r) => r.query)).toEqual([
      {},
      { pageCursor: 'c1' },
      { pageCursor: 'c1' },
      { pageCursor: 'c1' },
    ]);
  });

  it('should give up on a cut-short page once the retry cap is reached', async () => {
    const { transport, client, clock } = cursorClient({ maxTransientRetries: 1 });
    const cut = () => new ChunkedTransferError('https://api.example.com/v3/list/', new Error('terminated'));
    transport.fail(cut()).fail(cut());

    await expect(collect(client.paginate('/list/', { budget: 'default' }))).rejects.toBeInstanceOf(
      ChunkedTransferError,
    );
    expect(transport.requests).toHaveLength(2);
    expect(clock.sleeps).toEqual([5000]);
  });

  it('should not retry a cut-short page on an offset walk', async () => {
    const { transport, client, clock } = offsetClient();
    transport.fail(new ChunkedTransferError('https://api.example.com/v2/books/', new Error('terminated')));

    await expect(collect(client.paginate('/books/', { budget: 'default' }))).rejects.toBeInstanceOf(
      ChunkedTransferError,
    );
    expect(transport.requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should raise DecodeError for a body that is not JSON', async () => {
    const { transport, client } = offsetClient();
    transport.reply(200, '<html>');

    await expect(collect(client.paginate('/books/', { budget: 'default' }))).rejects.toBeInstanceOf(
      DecodeError,
    );
  });
});
