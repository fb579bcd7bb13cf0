import { randomUUID } from 'crypto';
import type { z } from 'zod';
import { systemClock } from './clock';
import { decodeResponse } from './decoder';
import { CancelledError, TransportError } from './errors';
import type { TransportFailureReason } from './errors';
import { buildUrl, mergeHeaders, normalizeBaseUrl, serializeBody } from './requestBuilder';
import {
  computeBackoff,
  extractRateLimit,
  isRetryable,
  resolveResilience,
  statusToCategory,
} from './retry';
import type { ResolvedResilience } from './retry';
import { fetchTransport } from './transport/fetchTransport';
import type {
  Clock,
  ErrorCategory,
  HttpClientConfig,
  HttpRequestInterceptor,
  HttpRequestOptions,
  HttpResponse,
  HttpTransport,
  Logger,
  RateLimitFeedback,
  RawHttpResponse,
  RequestOutcome,
  TransportRequest,
} from './types';

/**
 * Mutable bookkeeping for one logical call. Created per call and dropped once
 * the call settles.
 */
export interface RetryState {
  attempt: number;
  startedAt: number;
  lastCategory: ErrorCategory;
  lastStatus?: number;
  lastError?: unknown;
  rateLimit?: RateLimitFeedback;
}

export interface SendResult {
  request: TransportRequest;
  response: RawHttpResponse;
  outcome: RequestOutcome;
  requestId: string;
}

type AttemptResult =
  | { type: 'response'; request: TransportRequest; response: RawHttpResponse }
  | { type: 'failure'; request: TransportRequest; category: 'network' | 'timeout'; error: unknown };

const REASON_BY_CATEGORY: Partial<Record<ErrorCategory, TransportFailureReason>> = {
  network: 'ConnectionFailed',
  timeout: 'Timeout',
  rate_limit: 'RateLimitExceeded',
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class HttpClient {
  private readonly baseUrl?: string;
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly clock: Clock;
  private readonly interceptors: readonly HttpRequestInterceptor[];

  constructor(private readonly config: HttpClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.clientName = config.clientName ?? 'http-client';
    this.transport = config.transport ?? fetchTransport;
    this.logger = config.logger;
    this.clock = config.clock ?? systemClock;
    this.interceptors = [...(config.interceptors ?? [])];
  }

  getBaseUrl(): string | undefined {
    return this.baseUrl;
  }

  /**
   * Performs one logical request and decodes the body with `schema`.
   *
   * Resolves with the decoded body and the request outcome (attempt count,
   * timing, rate-limit feedback). Rejects with exactly one of the client error
   * classes.
   *
   * @example
   * ```typescript
   * const response = await client.execute(
   *   { method: 'GET', path: '/clock', operation: 'clock.get' },
   *   clockSchema,
   * );
   * console.log(response.body.is_open, response.outcome.attempts);
   * ```
   */
  async execute<T>(opts: HttpRequestOptions, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<HttpResponse<T>> {
    const result = await this.send(opts);
    try {
      const body = decodeResponse(result.response, schema, {
        retryAfterMs: result.response.status === 429 ? result.outcome.rateLimit?.retryAfterMs : undefined,
      });
      return {
        status: result.response.status,
        headers: result.response.headers,
        body,
        outcome: result.outcome,
        requestId: result.requestId,
      };
    } catch (error) {
      this.logger?.error('http.response.rejected', {
        ...this.baseLogMeta(opts, result.requestId),
        status: result.response.status,
        error: describeError(error),
      });
      throw error;
    }
  }

  /**
   * Like {@link execute}, but resolves with the decoded body only.
   */
  async requestJson<T>(opts: HttpRequestOptions, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.execute(opts, schema);
    return response.body;
  }

  /**
   * Builds the request exactly as it would go on the wire for `attempt`:
   * URL with query, default and per-call headers, serialized body, and every
   * `beforeSend` interceptor applied.
   */
  async prepareRequest(
    opts: HttpRequestOptions,
    attempt = 1,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<TransportRequest> {
    const headers = mergeHeaders({ Accept: 'application/json' }, this.config.defaultHeaders, opts.headers);
    const url = buildUrl(this.baseUrl, opts.path, opts.query);
    const body = serializeBody(opts.body, headers);
    const request: TransportRequest =
      body === undefined
        ? { method: opts.method, url, headers }
        : { method: opts.method, url, headers, body };

    for (const interceptor of this.interceptors) {
      if (!interceptor.beforeSend) continue;
      try {
        await interceptor.beforeSend({ request, options: opts, attempt, signal });
      } catch (error) {
        this.logger?.warn('http.interceptor.beforeSend.failed', {
          client: this.clientName,
          operation: opts.operation,
          error: describeError(error),
        });
        throw error;
      }
    }
    return request;
  }

  /**
   * Runs the retry loop and returns the final response without decoding it.
   *
   * Successful responses and non-retryable error statuses come back as is.
   * Retryable statuses that survive every attempt come back as well, so the
   * decoder can report them. Connection failures, timeouts and rate limiting
   * that outlast the policy throw {@link TransportError}; caller aborts throw
   * {@link CancelledError}.
   */
  async send(opts: HttpRequestOptions): Promise<SendResult> {
    const profile = resolveResilience(this.config.defaultResilience, opts.resilience);
    const requestId = opts.requestId ?? randomUUID();
    const state: RetryState = { attempt: 0, startedAt: this.clock.now(), lastCategory: 'none' };
    const deadline = state.startedAt + profile.overallTimeoutMs;
    const meta = this.baseLogMeta(opts, requestId);

    for (;;) {
      if (opts.signal?.aborted) {
        throw this.cancelled(opts, requestId, opts.signal.reason);
      }
      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        throw await this.fail(opts, state, 'Timeout', requestId, 'overall timeout elapsed before the next attempt');
      }
      state.attempt += 1;

      this.logger?.debug('http.request.attempt', { ...meta, attempt: state.attempt, maxAttempts: profile.maxAttempts });
      const result = await this.runAttempt(opts, state.attempt, Math.min(profile.perAttemptTimeoutMs, remaining), requestId);

      let retryAfterMs: number | undefined;
      if (result.type === 'response') {
        const { response } = result;
        const category = statusToCategory(response.status, profile.retryableStatuses);
        state.lastStatus = response.status;
        state.lastCategory = category;
        state.lastError = undefined;
        const rateLimit = extractRateLimit(response.headers, this.clock.now());
        if (rateLimit) {
          state.rateLimit = rateLimit;
        }

        if (category === 'none' || !isRetryable(category, opts.method, profile, opts.idempotent)) {
          return this.settle(opts, state, result.request, response, requestId);
        }
        retryAfterMs = rateLimit?.retryAfterMs;
      } else {
        state.lastCategory = result.category;
        state.lastError = result.error;
        state.lastStatus = undefined;
        if (!isRetryable(result.category, opts.method, profile, opts.idempotent)) {
          throw await this.fail(opts, state, REASON_BY_CATEGORY[result.category] ?? 'ConnectionFailed', requestId);
        }
      }

      const delay = this.nextDelay(state, profile, retryAfterMs);
      if (delay === undefined || state.attempt >= profile.maxAttempts || this.clock.now() + delay >= deadline) {
        if (result.type === 'response' && state.lastCategory === 'transient') {
          return this.settle(opts, state, result.request, result.response, requestId);
        }
        throw await this.fail(opts, state, REASON_BY_CATEGORY[state.lastCategory] ?? 'ConnectionFailed', requestId);
      }

      this.logger?.warn('http.request.retry', {
        ...meta,
        attempt: state.attempt,
        maxAttempts: profile.maxAttempts,
        status: state.lastStatus,
        errorCategory: state.lastCategory,
        error: state.lastError === undefined ? undefined : describeError(state.lastError),
        delayMs: delay,
      });

      try {
        await this.clock.sleep(delay, opts.signal);
      } catch (error) {
        if (opts.signal?.aborted) {
          throw this.cancelled(opts, requestId, error);
        }
        throw error;
      }
    }
  }

  private async runAttempt(
    opts: HttpRequestOptions,
    attempt: number,
    timeoutMs: number,
    requestId: string,
  ): Promise<AttemptResult> {
    const controller = new AbortController();
    const callerSignal = opts.signal;
    const onCallerAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    let timedOut = false;
    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    let request: TransportRequest | undefined;
    try {
      request = await this.prepareRequest(opts, attempt, controller.signal);
      const response = await this.transport(request, controller.signal);
      await this.runAfterResponseInterceptors(request, opts, attempt, response);
      return { type: 'response', request, response };
    } catch (error) {
      if (callerSignal?.aborted) {
        throw this.cancelled(opts, requestId, error);
      }
      if (!request) {
        throw error;
      }
      await this.runErrorInterceptors(request, opts, attempt, error);
      return { type: 'failure', request, category: timedOut ? 'timeout' : 'network', error };
    } finally {
      clearTimeout(timeoutHandle);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Delay before the next attempt, or `undefined` when the server asked for a
   * longer pause than the policy allows.
   */
  private nextDelay(state: RetryState, profile: ResolvedResilience, retryAfterMs?: number): number | undefined {
    if (state.lastCategory === 'rate_limit' && retryAfterMs !== undefined) {
      return retryAfterMs <= profile.maxSuggestedRetryDelayMs ? retryAfterMs : undefined;
    }
    return computeBackoff(state.attempt, profile);
  }

  private async settle(
    opts: HttpRequestOptions,
    state: RetryState,
    request: TransportRequest,
    response: RawHttpResponse,
    requestId: string,
  ): Promise<SendResult> {
    const outcome = this.buildOutcome(state, {
      ok: state.lastCategory === 'none',
      status: response.status,
      errorMessage: state.lastCategory === 'none' ? undefined : `HTTP ${response.status}`,
    });
    const meta = { ...this.baseLogMeta(opts, requestId), attempt: state.attempt, status: response.status };
    if (outcome.ok) {
      this.logger?.info('http.request.success', { ...meta, durationMs: outcome.durationMs });
    } else {
      this.logger?.error('http.request.failed', { ...meta, errorCategory: outcome.category });
    }
    await this.recordMetrics(opts, request.url, outcome);
    return { request, response, outcome, requestId };
  }

  private async fail(
    opts: HttpRequestOptions,
    state: RetryState,
    reason: TransportFailureReason,
    requestId: string,
    detail?: string,
  ): Promise<TransportError> {
    const cause = state.lastError;
    const why = detail ?? (cause !== undefined ? describeError(cause) : state.lastStatus ? `HTTP ${state.lastStatus}` : reason);
    const message = `${opts.method} ${opts.path} failed after ${state.attempt} attempt(s): ${why}`;
    const outcome = this.buildOutcome(state, { ok: false, status: state.lastStatus, errorMessage: message });
    this.logger?.error('http.request.failed', {
      ...this.baseLogMeta(opts, requestId),
      attempt: state.attempt,
      status: state.lastStatus,
      errorCategory: state.lastCategory,
      error: why,
    });
    await this.recordMetrics(opts, this.safeBuildUrl(opts), outcome);
    return new TransportError(message, {
      reason,
      attempts: state.attempt,
      lastStatus: state.lastStatus,
      retryAfterMs: state.lastCategory === 'rate_limit' ? state.rateLimit?.retryAfterMs : undefined,
      cause,
    });
  }

  private cancelled(opts: HttpRequestOptions, requestId: string, cause?: unknown): CancelledError {
    this.logger?.info('http.request.cancelled', this.baseLogMeta(opts, requestId));
    return new CancelledError(`${opts.method} ${opts.path} was cancelled`, { cause });
  }

  private buildOutcome(
    state: RetryState,
    fields: { ok: boolean; status?: number; errorMessage?: string },
  ): RequestOutcome {
    const finishedAt = this.clock.now();
    return {
      ok: fields.ok,
      status: fields.status,
      category: state.lastCategory,
      attempts: state.attempt,
      startedAt: new Date(state.startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - state.startedAt,
      errorMessage: fields.errorMessage,
      rateLimit: state.rateLimit,
    };
  }

  private async runAfterResponseInterceptors(
    request: TransportRequest,
    options: HttpRequestOptions,
    attempt: number,
    response: RawHttpResponse,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      try {
        await interceptor.afterResponse({ request, options, attempt, response });
      } catch (error) {
        this.logger?.warn('http.interceptor.afterResponse.failed', {
          client: this.clientName,
          operation: options.operation,
          error: describeError(error),
        });
      }
    }
  }

  private async runErrorInterceptors(
    request: TransportRequest,
    options: HttpRequestOptions,
    attempt: number,
    error: unknown,
  ): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError({ request, options, attempt, error });
      } catch (hookError) {
        this.logger?.warn('http.interceptor.onError.failed', {
          client: this.clientName,
          operation: options.operation,
          error: describeError(hookError),
        });
      }
    }
  }

  private async recordMetrics(opts: HttpRequestOptions, url: string, outcome: RequestOutcome): Promise<void> {
    try {
      await this.config.metrics?.recordRequest?.({
        client: this.clientName,
        operation: opts.operation ?? `${opts.method} ${opts.path}`,
        method: opts.method,
        url,
        outcome,
      });
    } catch (error) {
      this.logger?.warn('http.metrics.error', {
        client: this.clientName,
        operation: opts.operation,
        error: describeError(error),
      });
    }
  }

  private safeBuildUrl(opts: HttpRequestOptions): string {
    try {
      return buildUrl(this.baseUrl, opts.path, opts.query);
    } catch {
      return opts.path;
    }
  }

  private baseLogMeta(opts: HttpRequestOptions, requestId?: string) {
    return {
      client: this.clientName,
      operation: opts.operation,
      method: opts.method,
      path: opts.path,
      requestId,
    };
  }
}
