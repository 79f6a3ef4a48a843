import { ChunkedTransferError, NetworkError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | undefined;

/** Query parameters; `undefined` entries are left off the URL. */
export type QueryParams = Record<string, QueryValue>;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  query?: QueryParams;
  /** Serialized as JSON when present. */
  body?: unknown;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

/**
 * The only thing the clients need from an HTTP stack: send one request
 * and hand back status, headers and the raw body.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Read a response header regardless of the case it was sent in.
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}

/**
 * Append query parameters to a URL, skipping `undefined` values.
 */
export function buildUrl(url: string, query?: QueryParams): string {
  const target = new URL(url);

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) {
        target.searchParams.set(key, String(value));
      }
    }
  }

  return target.toString();
}

/**
 * `HttpTransport` backed by the global `fetch`.
 *
 * A failure before any response arrives becomes a `NetworkError`; a
 * failure while reading the body (a truncated chunked transfer) becomes a
 * `ChunkedTransferError`.
 */
export class FetchTransport implements HttpTransport {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const url = buildUrl(request.url, request.query);
    const headers: Record<string, string> = { ...request.headers };
    let body: string | undefined;

    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(request.body);
    }

    let response: Response;
    try {
      response = await fetch(url, { method: request.method, headers, body });
    } catch (error: unknown) {
      throw new NetworkError(url, error);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error: unknown) {
      throw new ChunkedTransferError(url, error);
    }

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value;
    });

    return { status: response.status, headers: responseHeaders, body: text };
  }
}
