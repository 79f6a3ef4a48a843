#!/usr/bin/env node

import 'dotenv/config';
import { Command, Option } from 'commander';
import chalk from 'chalk';

// ── API layer ────────────────────────────────────────────────────────
import { LegacyHighlightsClient } from './api/highlights.js';
import { ReaderClient } from './api/reader.js';

// ── Utilities ────────────────────────────────────────────────────────
import { logger, createSpinner, setVerbose } from './utils/logger.js';
import { loadConfig, mergeConfigs, getDefaultConfig, resolveToken } from './utils/config.js';

// ── Types ────────────────────────────────────────────────────────────
import type {
  BookCategory,
  DocumentCategory,
  DocumentLocation,
} from './types.js';

const BOOK_CATEGORIES: readonly BookCategory[] = [
  'books',
  'articles',
  'tweets',
  'supplementals',
  'podcasts',
];
const DOCUMENT_LOCATIONS: readonly DocumentLocation[] = ['new', 'later', 'archive', 'feed'];
const DOCUMENT_CATEGORIES: readonly DocumentCategory[] = [
  'article',
  'email',
  'rss',
  'highlight',
  'note',
  'pdf',
  'epub',
  'tweet',
  'video',
];

// ─── CLI setup ───────────────────────────────────────────────────────

type GlobalOptions = {
  config?: string;
  token?: string;
  verbose?: boolean;
};

const program = new Command();

program
  .name('readwise')
  .description('Query and update a Readwise library from the command line')
  .version('0.1.0')
  .option('--config <path>', 'Path to readwise.json config file')
  .option('--token <token>', 'Readwise API token (default: $READWISE_TOKEN)')
  .option('--verbose', 'Enable debug logging');

// ─── Legacy highlights API ───────────────────────────────────────────

program
  .command('auth')
  .description('Check that the API token is accepted')
  .action(handle(async () => {
    const { legacy } = await createClients();
    if (await legacy.validateToken()) {
      logger.success('Token is valid');
    } else {
      throw new Error('Token was rejected by Readwise');
    }
  }));

program
  .command('books')
  .description('List books as JSON lines')
  .addOption(new Option('--category <category>', 'Only books in this category').choices(BOOK_CATEGORIES))
  .option('--updated-after <date>', 'Only books updated after this ISO-8601 date')
  .action(handle(async (opts: { category?: string; updatedAfter?: string }) => {
    const { legacy } = await createClients();
    await printAll(
      'books',
      legacy.getBooks({
        category: pickChoice(opts.category, BOOK_CATEGORIES),
        updatedAfter: parseDateOption(opts.updatedAfter, '--updated-after'),
      }),
    );
  }));

program
  .command('book')
  .description('Show a single book')
  .argument('<bookId>', 'Book id')
  .action(handle(async (bookId: string) => {
    const { legacy } = await createClients();
    printRecord(await legacy.getBook(bookId));
  }));

program
  .command('highlights')
  .description('List highlights as JSON lines')
  .option('--book <bookId>', 'Only highlights from this book')
  .option('--updated-after <date>', 'Only highlights updated after this ISO-8601 date')
  .action(handle(async (opts: { book?: string; updatedAfter?: string }) => {
    const { legacy } = await createClients();
    const highlights = opts.book
      ? legacy.getBookHighlights(opts.book)
      : legacy.getHighlights({
          updatedAfter: parseDateOption(opts.updatedAfter, '--updated-after'),
        });
    await printAll('highlights', highlights);
  }));

program
  .command('highlight-create')
  .description('Create a highlight')
  .requiredOption('--text <text>', 'Highlighted text')
  .requiredOption('--title <title>', 'Title of the book or article')
  .option('--author <author>', 'Author')
  .option('--source-url <url>', 'Where the text comes from')
  .option('--note <note>', 'Note attached to the highlight')
  .option('--highlighted-at <date>', 'When the text was highlighted (ISO-8601)')
  .addOption(new Option('--category <category>', 'Book category').choices(BOOK_CATEGORIES))
  .action(handle(async (opts: {
    text: string;
    title: string;
    author?: string;
    sourceUrl?: string;
    note?: string;
    highlightedAt?: string;
    category?: string;
  }) => {
    const { legacy } = await createClients();
    await legacy.createHighlight({
      text: opts.text,
      title: opts.title,
      author: opts.author,
      sourceUrl: opts.sourceUrl,
      note: opts.note,
      highlightedAt: parseDateOption(opts.highlightedAt, '--highlighted-at'),
      category: pickChoice(opts.category, BOOK_CATEGORIES),
    });
    logger.success(`Highlight added to "${opts.title}"`);
  }));

program
  .command('tags')
  .description('List the tags on a book')
  .argument('<bookId>', 'Book id')
  .action(handle(async (bookId: string) => {
    const { legacy } = await createClients();
    await printAll('tags', legacy.getBookTags(bookId));
  }));

program
  .command('tag-add')
  .description('Tag a book')
  .argument('<bookId>', 'Book id')
  .argument('<name>', 'Tag name')
  .action(handle(async (bookId: string, name: string) => {
    const { legacy } = await createClients();
    await legacy.addTag(bookId, name);
    logger.success(`Tagged book ${bookId} with "${name}"`);
  }));

program
  .command('tag-delete')
  .description('Remove a tag from a book')
  .argument('<bookId>', 'Book id')
  .argument('<tagId>', 'Tag id')
  .action(handle(async (bookId: string, tagId: string) => {
    const { legacy } = await createClients();
    await legacy.deleteTag(bookId, tagId);
    logger.success(`Removed tag ${tagId} from book ${bookId}`);
  }));

// ─── Reader API ──────────────────────────────────────────────────────

program
  .command('documents')
  .description('List Reader documents as JSON lines')
  .addOption(new Option('--location <location>', 'Only documents in this location').choices(DOCUMENT_LOCATIONS))
  .addOption(new Option('--category <category>', 'Only documents of this kind').choices(DOCUMENT_CATEGORIES))
  .option('--updated-after <date>', 'Only documents updated after this ISO-8601 date')
  .action(handle(async (opts: { location?: string; category?: string; updatedAfter?: string }) => {
    const { reader } = await createClients();
    await printAll(
      'documents',
      reader.getDocuments({
        location: pickChoice(opts.location, DOCUMENT_LOCATIONS),
        category: pickChoice(opts.category, DOCUMENT_CATEGORIES),
        updatedAfter: parseDateOption(opts.updatedAfter, '--updated-after'),
      }),
    );
  }));

program
  .command('document')
  .description('Show a single Reader document')
  .argument('<documentId>', 'Document id')
  .action(handle(async (documentId: string) => {
    const { reader } = await createClients();
    const document = await reader.getDocument(documentId);
    if (!document) {
      throw new Error(`No document with id ${documentId}`);
    }
    printRecord(document);
  }));

program
  .command('save')
  .description('Save a URL to Reader')
  .argument('<url>', 'URL to save')
  .option('--title <title>', 'Document title')
  .option('--author <author>', 'Document author')
  .option('--summary <summary>', 'Document summary')
  .option('--image-url <url>', 'Cover image URL')
  .addOption(new Option('--location <location>', 'Where to file it').choices(DOCUMENT_LOCATIONS))
  .option('--tag <name...>', 'Tags to apply')
  .action(handle(async (url: string, opts: {
    title?: string;
    author?: string;
    summary?: string;
    imageUrl?: string;
    location?: string;
    tag?: string[];
  }) => {
    const { reader } = await createClients();
    const created = await reader.createDocument({
      url,
      title: opts.title,
      author: opts.author,
      summary: opts.summary,
      imageUrl: opts.imageUrl,
      location: pickChoice(opts.location, DOCUMENT_LOCATIONS),
      tags: opts.tag,
      savedUsing: 'readwise-api-client',
    });
    printRecord(created);
  }));

program
  .command('document-delete')
  .description('Delete a Reader document')
  .argument('<documentId>', 'Document id')
  .action(handle(async (documentId: string) => {
    const { reader } = await createClients();
    await reader.deleteDocument(documentId);
    logger.success(`Deleted document ${documentId}`);
  }));

await program.parseAsync();

// ─── Helpers ─────────────────────────────────────────────────────────

async function createClients(): Promise<{
  legacy: LegacyHighlightsClient;
  reader: ReaderClient;
}> {
  const opts = program.opts<GlobalOptions>();
  if (opts.verbose) {
    setVerbose(true);
  }

  const fileConfig = await loadConfig(opts.config);
  const config = mergeConfigs(getDefaultConfig(), fileConfig, {
    token: opts.token,
    verbose: opts.verbose,
  });
  if (config.verbose) {
    setVerbose(true);
  }

  const token = resolveToken(config);
  logger.debug(`Legacy API at ${config.legacyBaseUrl}, Reader API at ${config.readerBaseUrl}`);

  const shared = {
    maxRateLimitAttempts: config.maxRateLimitAttempts,
  };

  return {
    legacy: new LegacyHighlightsClient(token, {
      ...shared,
      baseUrl: config.legacyBaseUrl,
      pageSize: config.pageSize,
    }),
    reader: new ReaderClient(token, {
      ...shared,
      baseUrl: config.readerBaseUrl,
      transientRetryDelayMs: config.transientRetryDelayMs,
      maxTransientRetries: config.maxTransientRetries,
    }),
  };
}

/**
 * Wrap a command action so failures print a message and exit non-zero.
 */
function handle<TArgs extends unknown[]>(
  action: (...args: TArgs) => Promise<void>,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs) => {
    try {
      await action(...args);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(message);
      if (error instanceof Error && error.stack) {
        logger.debug(error.stack);
      }
      process.exit(1);
    }
  };
}

function printRecord(record: unknown): void {
  process.stdout.write(`${JSON.stringify(record)}\n`);
}

async function printAll(label: string, records: AsyncIterable<unknown>): Promise<void> {
  const spinner = createSpinner(`Fetching ${label}...`).start();
  let count = 0;

  try {
    for await (const record of records) {
      printRecord(record);
      count++;
      spinner.text = `Fetching ${label}... ${chalk.bold(count)}`;
    }
  } catch (error: unknown) {
    spinner.fail(`Stopped after ${count} ${label}`);
    throw error;
  }

  spinner.succeed(`${count} ${label}`);
}

function pickChoice<T extends string>(value: string | undefined, choices: readonly T[]): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  return choices.find((choice) => choice === value);
}

function parseDateOption(value: string | undefined, flag: string): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const millis = Date.parse(value);
  if (Number.isNaN(millis)) {
    throw new Error(`${flag} expects an ISO-8601 date, got "${value}"`);
  }
  return new Date(millis);
}
