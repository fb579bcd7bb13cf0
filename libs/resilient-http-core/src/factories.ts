import { HttpClient } from './HttpClient';
import { DEFAULT_RESILIENCE } from './retry';
import { fetchTransport } from './transport/fetchTransport';
import type { HttpClientConfig, Logger, LoggerMeta } from './types';

/**
 * Console logger implementation for use with createDefaultHttpClient.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(message, meta);
  }
}

/**
 * Creates an HttpClient with sensible defaults.
 *
 * Defaults applied:
 * - Transport: fetch-based (via fetchTransport)
 * - Resilience: 5 max attempts, 30s per attempt, 60s overall, exponential backoff with 20% jitter
 * - Logger: console logger
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({
 *   clientName: 'my-api',
 *   baseUrl: 'https://api.example.com/v1',
 * });
 *
 * const user = await client.requestJson(
 *   { method: 'GET', operation: 'getUser', path: '/users/123' },
 *   userSchema,
 * );
 * ```
 */
export function createDefaultHttpClient(
  config: HttpClientConfig & { clientName: string }
): HttpClient {
  return new HttpClient({
    ...config,
    transport: config.transport ?? fetchTransport,
    defaultResilience: {
      ...DEFAULT_RESILIENCE,
      ...config.defaultResilience,
    },
    logger: config.logger ?? new ConsoleLogger(),
  });
}
