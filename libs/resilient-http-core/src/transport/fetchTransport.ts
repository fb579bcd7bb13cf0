import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * fetch-based HTTP transport.
 * Uses the global fetch API and reads the body as text; header names are lower-cased.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  const response = await fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal,
  });
  const body = await response.text();

  const headers: HttpHeaders = {};
  response.headers.forEach((value, key) => {
    headers[key.toLowerCase()] = value;
  });

  return {
    status: response.status,
    headers,
    body,
  };
};
