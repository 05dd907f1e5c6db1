/**
 * HTTP transport
 *
 * The client never talks to `fetch` directly: every request goes through an
 * HttpTransport so tests and alternative runtimes can supply their own.
 */

import type { JsonValue } from "@modrinth-kit/codec";

// ============================================================================
// Types
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL without a query string */
  url: string;
  headers: Record<string, string>;
  /** Entries whose value is `undefined` are skipped */
  query?: Record<string, QueryValue>;
  /** Sent as JSON */
  body?: JsonValue;
}

export interface TransportResponse {
  status: number;
  /** Parsed JSON; `null` for an empty body. Non-JSON bodies come back as text. */
  body: unknown;
}

export interface HttpTransport {
  request(req: TransportRequest): Promise<TransportResponse>;
}

// ============================================================================
// Fetch Transport
// ============================================================================

export interface FetchTransportOptions {
  /** Custom fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

/**
 * Build the full request URL, appending defined query entries in insertion order
 */
export function buildUrl(url: string, query?: Record<string, QueryValue>): string {
  if (!query) {
    return url;
  }
  const params = new URLSearchParams();
  for (const [key, val] of Object.entries(query)) {
    if (val !== undefined) {
      params.append(key, String(val));
    }
  }
  const search = params.toString();
  return search ? `${url}?${search}` : url;
}

async function parseBody(response: Response): Promise<unknown> {
  if (response.status === 204) {
    return null;
  }
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    // Some endpoints answer errors in plain text
    return text;
  }
}

/**
 * Default transport on top of fetch
 */
export function createFetchTransport(options: FetchTransportOptions = {}): HttpTransport {
  const fetchFn = options.fetch ?? fetch;

  return {
    async request(req) {
      const headers: Record<string, string> = { ...req.headers };
      let body: string | undefined;
      if (req.body !== undefined) {
        headers["Content-Type"] = "application/json";
        body = JSON.stringify(req.body);
      }

      const response = await fetchFn(buildUrl(req.url, req.query), {
        method: req.method,
        headers,
        body,
      });

      return { status: response.status, body: await parseBody(response) };
    },
  };
}
