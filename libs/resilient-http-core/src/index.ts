export * from './types';
export * from './errors';
export { HttpClient } from './HttpClient';
export type { RetryState, SendResult } from './HttpClient';
export { ConsoleLogger, createDefaultHttpClient } from './factories';
export { createAuthInterceptor, createHeadersInterceptor } from './interceptors';
export type { AuthInterceptorOptions } from './interceptors';
export { apiErrorBodySchema, decodeResponse } from './decoder';
export type { ApiErrorBody } from './decoder';
export { buildUrl, parseQuery, serializeBody } from './requestBuilder';
export {
  DEFAULT_RESILIENCE,
  MAX_TIMER_DELAY_MS,
  computeBackoff,
  extractRateLimit,
  isRetryable,
  parseRetryAfter,
  resolveResilience,
  statusToCategory,
} from './retry';
export type { ResolvedResilience } from './retry';
export { systemClock } from './clock';
export * from './transport/fetchTransport';
export * from './pagination';
