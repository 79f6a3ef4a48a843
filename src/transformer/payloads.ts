import type {
  CreateDocumentInput,
  CreateHighlightInput,
  UpdateDocumentInput,
} from '../types.js';

/**
 * Body of `POST /highlights/`. The endpoint only accepts batches, so a
 * single highlight still travels inside a one-element `highlights` list.
 *
 * Optional fields are left out entirely when not provided; the server
 * reads a missing key as "unset" but would store an explicit null.
 */
export function buildHighlightPayload(
  input: CreateHighlightInput,
): { highlights: Array<Record<string, string>> } {
  const highlight: Record<string, string> = {
    text: input.text,
    title: input.title,
    category: input.category ?? 'articles',
  };

  if (input.author) highlight['author'] = input.author;
  if (input.highlightedAt) highlight['highlighted_at'] = input.highlightedAt.toISOString();
  if (input.sourceUrl) highlight['source_url'] = input.sourceUrl;
  if (input.note) highlight['note'] = input.note;

  return { highlights: [highlight] };
}

/**
 * Body of the Reader `POST /save/` call.
 */
export function buildDocumentPayload(input: CreateDocumentInput): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    url: input.url,
    tags: [...(input.tags ?? [])],
    location: input.location ?? 'new',
  };

  if (input.html) payload['html'] = input.html;
  if (input.shouldCleanHtml !== undefined) payload['should_clean_html'] = input.shouldCleanHtml;
  if (input.title) payload['title'] = input.title;
  if (input.author) payload['author'] = input.author;
  if (input.summary) payload['summary'] = input.summary;
  if (input.publishedAt) payload['published_at'] = input.publishedAt.toISOString();
  if (input.imageUrl) payload['image_url'] = input.imageUrl;
  if (input.savedUsing) payload['saved_using'] = input.savedUsing;

  return payload;
}

/**
 * Body of the Reader `PATCH /update/{id}/` call. Only the given fields
 * are sent; everything else keeps its server-side value.
 */
export function buildDocumentUpdatePayload(input: UpdateDocumentInput): Record<string, string> {
  const payload: Record<string, string> = {};

  if (input.title !== undefined) payload['title'] = input.title;
  if (input.author !== undefined) payload['author'] = input.author;
  if (input.summary !== undefined) payload['summary'] = input.summary;
  if (input.publishedDate) payload['published_date'] = input.publishedDate.toISOString();
  if (input.imageUrl !== undefined) payload['image_url'] = input.imageUrl;
  if (input.location) payload['location'] = input.location;
  if (input.category) payload['category'] = input.category;

  return payload;
}
