export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue =
  | string
  | number
  | boolean
  | Date
  | ReadonlyArray<string | number>
  | null
  | undefined;

/**
 * Query parameters. The tuple form keeps the caller's ordering for endpoints
 * that care about it; the record form follows insertion order.
 */
export type QueryTuple = readonly [string, QueryValue];

export type QueryParams = Readonly<Record<string, QueryValue>> | ReadonlyArray<QueryTuple>;

export type LoggerMeta = Record<string, unknown> & {
  client?: string;
  operation?: string;
  requestId?: string;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Time source used by the retry loop. Injected so tests can drive backoff
 * without real timers.
 */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface ResilienceProfile {
  maxAttempts?: number;          // Default: 5
  retryEnabled?: boolean;        // Default: true

  perAttemptTimeoutMs?: number;  // Default: 30_000
  overallTimeoutMs?: number;     // Default: 60_000

  baseBackoffMs?: number;        // Default: 250
  maxBackoffMs?: number;         // Default: 8_000
  jitterFactor?: number;         // Default: 0.2 (20% jitter)

  maxSuggestedRetryDelayMs?: number;  // Default: 60_000
  retryableStatuses?: readonly number[];  // Default: [500, 502, 503, 504]

  /** Retry POST/PATCH on network errors, timeouts and 5xx. 429 is always retried. */
  retryNonIdempotent?: boolean;  // Default: false
}

/**
 * Error category classification for a single attempt.
 *
 * - 'none': No error
 * - 'auth': Authentication/authorization failure (401, 403)
 * - 'validation': Client input validation error (400, 422)
 * - 'not_found': Resource missing (404)
 * - 'rate_limit': Rate limit exceeded (429)
 * - 'timeout': Attempt exceeded its time limit
 * - 'transient': Server error configured as retryable
 * - 'network': Connection-level failure (DNS, reset, refused)
 * - 'canceled': Caller aborted the request
 * - 'unknown': Unclassified
 */
export type ErrorCategory =
  | 'none'
  | 'auth'
  | 'validation'
  | 'not_found'
  | 'rate_limit'
  | 'timeout'
  | 'transient'
  | 'network'
  | 'canceled'
  | 'unknown';

export interface RateLimitFeedback {
  limit?: number;
  remaining?: number;
  resetAt?: Date;
  retryAfterMs?: number;
  raw: Record<string, string>;
}

/**
 * Request outcome summary for a logical HTTP request (all attempts).
 */
export interface RequestOutcome {
  ok: boolean;
  status?: number;
  category: ErrorCategory;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  errorMessage?: string;
  rateLimit?: RateLimitFeedback;
}

export interface MetricsRequestInfo {
  client: string;
  operation: string;
  method: HttpMethod;
  url: string;
  outcome: RequestOutcome;
}

export interface MetricsSink {
  recordRequest?(info: MetricsRequestInfo): void | Promise<void>;
}

/**
 * Fully built request handed to the transport for a single attempt.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string;
}

/**
 * Transport layer raw HTTP response. Header names are lower-cased.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: string;
}

export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export interface HttpClientConfig {
  baseUrl?: string;
  clientName?: string;
  transport?: HttpTransport;
  defaultHeaders?: HttpHeaders;
  defaultResilience?: ResilienceProfile;
  interceptors?: HttpRequestInterceptor[];
  logger?: Logger;
  metrics?: MetricsSink;
  clock?: Clock;
}

export interface HttpRequestOptions {
  method: HttpMethod;
  /** Relative to the client's base URL, or absolute. */
  path: string;
  query?: QueryParams;
  headers?: HttpHeaders;
  body?: unknown;
  operation?: string;
  requestId?: string;
  resilience?: ResilienceProfile;
  /**
   * Whether replaying the request is safe after a failure the server may have
   * processed. Defaults by method: GET, HEAD, OPTIONS, PUT and DELETE are.
   */
  idempotent?: boolean;
  /** Caller cancellation. Aborts the in-flight attempt and any pending backoff. */
  signal?: AbortSignal;
}

export interface HttpResponse<TBody = unknown> {
  status: number;
  headers: HttpHeaders;
  body: TBody;
  outcome: RequestOutcome;
  requestId: string;
}

export interface BeforeSendContext {
  request: TransportRequest;
  options: HttpRequestOptions;
  attempt: number;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  request: TransportRequest;
  options: HttpRequestOptions;
  attempt: number;
  response: RawHttpResponse;
}

export interface OnErrorContext {
  request: TransportRequest;
  options: HttpRequestOptions;
  attempt: number;
  error: unknown;
}

/**
 * HTTP request interceptor for cross-cutting concerns.
 *
 * **Execution Order:**
 * 1. `beforeSend`: registration order, before every attempt (including retries).
 *    May mutate `ctx.request` (headers, url, body). Throwing aborts the call.
 * 2. `afterResponse`: reverse registration order, after every response that
 *    reached the client, whatever its status.
 * 3. `onError`: reverse registration order, after every attempt that failed at
 *    the transport level.
 *
 * Observers (`afterResponse`, `onError`) cannot suppress anything; if they throw,
 * the failure is logged and the remaining interceptors still run.
 * Interceptors must not implement their own retry loops.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
  onError?(ctx: OnErrorContext): Promise<void> | void;
}
