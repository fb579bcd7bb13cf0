export type HttpClientErrorKind =
  | 'configuration'
  | 'transport'
  | 'decoding'
  | 'api'
  | 'api_unclassified'
  | 'cancelled';

/**
 * Base class for every error a client call can surface. `kind` lets callers
 * switch over the taxonomy without a chain of instanceof checks.
 */
export abstract class HttpClientError extends Error {
  abstract readonly kind: HttpClientErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid construction inputs. Raised before any request is attempted.
 */
export class ConfigurationError extends HttpClientError {
  readonly kind = 'configuration';
}

export type TransportFailureReason = 'Timeout' | 'ConnectionFailed' | 'RateLimitExceeded';

export class TransportError extends HttpClientError {
  readonly kind = 'transport';
  readonly reason: TransportFailureReason;
  readonly attempts: number;
  readonly lastStatus?: number;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: {
      reason: TransportFailureReason;
      attempts: number;
      lastStatus?: number;
      retryAfterMs?: number;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.reason = options.reason;
    this.attempts = options.attempts;
    this.lastStatus = options.lastStatus;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export interface DecodingIssue {
  path: Array<string | number>;
  message: string;
}

/**
 * A 2xx response whose body does not have the expected shape.
 */
export class DecodingError extends HttpClientError {
  readonly kind = 'decoding';
  readonly status: number;
  readonly issues: DecodingIssue[];
  readonly body: string;

  constructor(message: string, options: { status: number; issues?: DecodingIssue[]; body: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.issues = options.issues ?? [];
    this.body = options.body;
  }
}

/**
 * Structured error reported by the remote service (`{ code, message }` body).
 */
export class ApiError extends HttpClientError {
  readonly kind = 'api';
  readonly status: number;
  readonly code: number;
  readonly body: string;
  readonly retryAfterMs?: number;

  constructor(message: string, options: { status: number; code: number; body: string; retryAfterMs?: number }) {
    super(message);
    this.status = options.status;
    this.code = options.code;
    this.body = options.body;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Non-2xx response whose body is not in the service's error format.
 */
export class UnclassifiedApiError extends HttpClientError {
  readonly kind = 'api_unclassified';
  readonly status: number;
  readonly body: string;

  constructor(message: string, options: { status: number; body: string }) {
    super(message);
    this.status = options.status;
    this.body = options.body;
  }
}

export class CancelledError extends HttpClientError {
  readonly kind = 'cancelled';
}

export const isHttpClientError = (error: unknown): error is HttpClientError => error instanceof HttpClientError;
