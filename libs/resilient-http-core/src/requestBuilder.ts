import { ConfigurationError } from './errors';
import type { HttpHeaders, QueryParams, QueryTuple, QueryValue } from './types';

const queryEntries = (query?: QueryParams): QueryTuple[] => {
  if (!query) return [];
  if (isTupleList(query)) return [...query];
  return Object.entries(query);
};

const isTupleList = (query: QueryParams): query is ReadonlyArray<QueryTuple> => Array.isArray(query);

const formatQueryValue = (value: Exclude<QueryValue, null | undefined>): string => {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(String).join(',');
  return String(value);
};

export const isAbsoluteUrl = (path: string): boolean => /^[a-z][a-z\d+\-.]*:\/\//i.test(path);

export const normalizeBaseUrl = (value?: string): string | undefined => {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  return trimmed.replace(/\/+$/, '') || trimmed;
};

/**
 * Resolves `path` against `baseUrl` and appends the query string.
 *
 * `null` and `undefined` query values are dropped; arrays are sent as one
 * comma-separated value.
 */
export function buildUrl(baseUrl: string | undefined, path: string, query?: QueryParams): string {
  let url: URL;
  if (isAbsoluteUrl(path)) {
    url = new URL(path);
  } else {
    const base = normalizeBaseUrl(baseUrl);
    if (!base) {
      throw new ConfigurationError('No baseUrl provided and request path is not an absolute URL');
    }
    const normalizedPath = path.replace(/^\/+/, '');
    url = new URL(normalizedPath ? `${base}/${normalizedPath}` : base);
  }

  for (const [key, value] of queryEntries(query)) {
    if (value === undefined || value === null) continue;
    url.searchParams.append(key, formatQueryValue(value));
  }
  return url.toString();
}

/**
 * Ordered query pairs of a built URL. Inverse of the query half of {@link buildUrl}.
 */
export function parseQuery(url: string): Array<[string, string]> {
  return [...new URL(url).searchParams.entries()];
}

export function hasHeader(headers: HttpHeaders, name: string): boolean {
  const lower = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

/**
 * Encodes a request body. Strings pass through untouched; anything else is sent
 * as JSON and gets a JSON content type unless the caller set one.
 */
export function serializeBody(body: unknown, headers: HttpHeaders): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === 'string') {
    return body;
  }
  if (!hasHeader(headers, 'content-type')) {
    headers['Content-Type'] = 'application/json';
  }
  return JSON.stringify(body);
}

/** Sets `name`, dropping any header that differs from it only in case. */
export function setHeader(headers: HttpHeaders, name: string, value: string): void {
  for (const key of Object.keys(headers)) {
    if (key !== name && key.toLowerCase() === name.toLowerCase()) {
      delete headers[key];
    }
  }
  headers[name] = value;
}

/** Later sources win; names compare case-insensitively and keep the last spelling. */
export function mergeHeaders(...sources: Array<HttpHeaders | undefined>): HttpHeaders {
  const result: HttpHeaders = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      setHeader(result, key, value);
    }
  }
  return result;
}
