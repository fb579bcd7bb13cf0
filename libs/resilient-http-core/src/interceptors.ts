// ============================================================================
// Standard Interceptors
// ============================================================================

import { setHeader } from './requestBuilder';
import type { BeforeSendContext, HttpHeaders, HttpRequestInterceptor } from './types';

// ============================================================================
// Auth Interceptor
// ============================================================================

export interface AuthInterceptorOptions {
  getToken: () => Promise<string | null> | string | null;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Creates an interceptor that adds an authorization header to each request.
 *
 * @example
 * ```typescript
 * const authInterceptor = createAuthInterceptor({
 *   getToken: () => process.env.OAUTH_TOKEN ?? null,
 * });
 *
 * const client = new HttpClient({
 *   interceptors: [authInterceptor],
 * });
 * ```
 */
export function createAuthInterceptor(
  opts: AuthInterceptorOptions
): HttpRequestInterceptor {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return {
    beforeSend: async (ctx: BeforeSendContext) => {
      const token = await opts.getToken();
      if (token) {
        setHeader(ctx.request.headers, headerName, formatToken(token));
      }
    },
  };
}

// ============================================================================
// Static Header Interceptor
// ============================================================================

/**
 * Creates an interceptor that sets a fixed group of headers on every attempt,
 * replacing any same-named header regardless of case. Used for credential
 * pairs that travel as separate headers.
 */
export function createHeadersInterceptor(headers: Readonly<HttpHeaders>): HttpRequestInterceptor {
  const entries = Object.entries(headers);
  return {
    beforeSend: (ctx: BeforeSendContext) => {
      for (const [name, value] of entries) {
        setHeader(ctx.request.headers, name, value);
      }
    },
  };
}
