/**
 * Request views
 *
 * Adapts transport-level request data into the shape the signer and
 * verifier read.
 */

import type { CanonicalRequestView, HeaderRecord } from './types.js';

export interface RequestViewInput {
  /** HTTP method (defaults to GET) */
  method?: string;
  /** Full URL, or a path with optional query */
  url: string;
  headers?: HeaderRecord;
}

/**
 * Build a request view from a method, URL and header record.
 *
 * The path and query are kept exactly as received; they are never decoded,
 * re-encoded or normalized.
 *
 * @example
 * createRequestView({ method: 'POST', url: 'https://example.org/a/b?x=1', headers: { Date: '...' } })
 * // { method: 'POST', path: '/a/b', query: 'x=1', authority: 'example.org', headers: { Date: '...' } }
 */
export function createRequestView(input: RequestViewInput): CanonicalRequestView {
  const method = input.method ?? 'GET';
  const headers = input.headers ?? {};

  const scheme = /^[a-z][a-z0-9+.-]*:\/\//i.exec(input.url);
  if (scheme) {
    // URL normalizes the path (dot segments, percent-encoding); only the host is taken from it
    const url = new URL(input.url);
    const rest = input.url.slice(scheme[0].length);
    const authorityEnd = rest.search(/[/?#]/);
    const target = authorityEnd === -1 ? '' : rest.slice(authorityEnd);
    return { method, ...splitTarget(target), authority: url.host, headers };
  }

  return { method, ...splitTarget(input.url), headers };
}

/**
 * Case-insensitive header lookup.
 *
 * Keys that differ only in case are merged in insertion order. Returns
 * undefined when the header is absent or carries no values.
 */
export function getHeaderValues(headers: HeaderRecord, name: string): string[] | undefined {
  const lowerName = name.toLowerCase();
  const values: string[] = [];

  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== lowerName || value === undefined) continue;
    if (typeof value === 'string') {
      values.push(value);
    } else {
      values.push(...value);
    }
  }

  return values.length > 0 ? values : undefined;
}

/**
 * Return a copy of the view with extra headers merged in.
 */
export function withHeaders(
  view: CanonicalRequestView,
  extra: Readonly<Record<string, string>>
): CanonicalRequestView {
  return { ...view, headers: { ...view.headers, ...extra } };
}

function splitTarget(target: string): { path: string; query?: string } {
  const hashIndex = target.indexOf('#');
  const withoutFragment = hashIndex === -1 ? target : target.slice(0, hashIndex);
  const queryIndex = withoutFragment.indexOf('?');
  const path = queryIndex === -1 ? withoutFragment : withoutFragment.slice(0, queryIndex);
  const query = queryIndex === -1 ? '' : withoutFragment.slice(queryIndex + 1);

  return {
    path: path || '/',
    ...(query ? { query } : {}),
  };
}
