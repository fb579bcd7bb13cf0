import type { ErrorCategory, HttpHeaders, HttpMethod, RateLimitFeedback, ResilienceProfile } from './types';

export const DEFAULT_RESILIENCE = {
  maxAttempts: 5,
  retryEnabled: true,
  perAttemptTimeoutMs: 30_000,
  overallTimeoutMs: 60_000,
  baseBackoffMs: 250,
  maxBackoffMs: 8_000,
  jitterFactor: 0.2,
  maxSuggestedRetryDelayMs: 60_000,
  retryableStatuses: [500, 502, 503, 504],
  retryNonIdempotent: false,
} as const satisfies Required<ResilienceProfile>;

export type ResolvedResilience = {
  readonly [K in keyof ResilienceProfile]-?: Exclude<ResilienceProfile[K], undefined>;
};

export const resolveResilience = (...profiles: Array<ResilienceProfile | undefined>): ResolvedResilience => {
  const merged: ResilienceProfile = { ...DEFAULT_RESILIENCE };
  for (const profile of profiles) {
    if (!profile) continue;
    for (const [key, value] of Object.entries(profile)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  const maxAttempts = finiteOr(merged.maxAttempts, DEFAULT_RESILIENCE.maxAttempts);
  return {
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
    retryEnabled: merged.retryEnabled ?? DEFAULT_RESILIENCE.retryEnabled,
    perAttemptTimeoutMs: delayOr(merged.perAttemptTimeoutMs, DEFAULT_RESILIENCE.perAttemptTimeoutMs),
    overallTimeoutMs: delayOr(merged.overallTimeoutMs, DEFAULT_RESILIENCE.overallTimeoutMs),
    baseBackoffMs: delayOr(merged.baseBackoffMs, DEFAULT_RESILIENCE.baseBackoffMs),
    maxBackoffMs: delayOr(merged.maxBackoffMs, DEFAULT_RESILIENCE.maxBackoffMs),
    jitterFactor: Math.min(1, Math.max(0, finiteOr(merged.jitterFactor, DEFAULT_RESILIENCE.jitterFactor))),
    maxSuggestedRetryDelayMs: delayOr(merged.maxSuggestedRetryDelayMs, DEFAULT_RESILIENCE.maxSuggestedRetryDelayMs),
    retryableStatuses: merged.retryableStatuses ?? DEFAULT_RESILIENCE.retryableStatuses,
    retryNonIdempotent: merged.retryNonIdempotent ?? DEFAULT_RESILIENCE.retryNonIdempotent,
  };
};

/** Largest delay a Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const finiteOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && Number.isFinite(value) ? value : fallback;

const delayOr = (value: number | undefined, fallback: number): number =>
  Math.min(MAX_TIMER_DELAY_MS, Math.max(0, finiteOr(value, fallback)));

const IDEMPOTENT_METHODS = new Set<HttpMethod>(['GET', 'HEAD', 'OPTIONS', 'PUT', 'DELETE']);

export const isIdempotent = (method: HttpMethod): boolean => IDEMPOTENT_METHODS.has(method);

export const statusToCategory = (status: number, retryableStatuses: readonly number[]): ErrorCategory => {
  if (status >= 200 && status < 300) return 'none';
  if (status === 401 || status === 403) return 'auth';
  if (status === 404) return 'not_found';
  if (status === 400 || status === 422) return 'validation';
  if (status === 429) return 'rate_limit';
  if (retryableStatuses.includes(status)) return 'transient';
  return 'unknown';
};

/**
 * Whether a failed attempt in `category` may be retried for `method`.
 * 429 means the request was rejected before processing, so it is safe for every method.
 * `idempotent` overrides the method's default, e.g. for a DELETE that places an order.
 */
export const isRetryable = (
  category: ErrorCategory,
  method: HttpMethod,
  profile: ResolvedResilience,
  idempotent: boolean = isIdempotent(method),
): boolean => {
  if (!profile.retryEnabled) return false;
  if (category === 'rate_limit') return true;
  if (category === 'transient' || category === 'network' || category === 'timeout') {
    return idempotent || profile.retryNonIdempotent;
  }
  return false;
};

/**
 * Exponential backoff with symmetric jitter: base * 2^(attempt-1), capped, then
 * scaled by a factor in [1 - jitter, 1 + jitter].
 */
export const computeBackoff = (
  attempt: number,
  profile: Pick<ResolvedResilience, 'baseBackoffMs' | 'maxBackoffMs' | 'jitterFactor'>,
  random: () => number = Math.random,
): number => {
  const exponential = Math.min(profile.maxBackoffMs, profile.baseBackoffMs * 2 ** (attempt - 1));
  const jitter = 1 - profile.jitterFactor + random() * 2 * profile.jitterFactor;
  return Math.max(0, Math.round(exponential * jitter));
};

export const parseRetryAfter = (value: string | undefined, now: number): number | undefined => {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined;
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : 0;
  }
  return undefined;
};

const getNumber = (value?: string) => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const RATE_LIMIT_HEADERS = ['x-ratelimit-limit', 'x-ratelimit-remaining', 'x-ratelimit-reset', 'retry-after'];

/**
 * Reads rate-limit headers. `x-ratelimit-reset` is epoch seconds; `retry-after`
 * wins over it when both are present.
 */
export const extractRateLimit = (headers: HttpHeaders, now: number): RateLimitFeedback | undefined => {
  const raw: Record<string, string> = {};
  for (const name of RATE_LIMIT_HEADERS) {
    const value = headers[name];
    if (value !== undefined) {
      raw[name] = value;
    }
  }
  if (Object.keys(raw).length === 0) return undefined;

  const feedback: RateLimitFeedback = { raw };
  const limit = getNumber(raw['x-ratelimit-limit']);
  if (limit !== undefined) feedback.limit = limit;
  const remaining = getNumber(raw['x-ratelimit-remaining']);
  if (remaining !== undefined) feedback.remaining = remaining;

  const reset = getNumber(raw['x-ratelimit-reset']);
  if (reset !== undefined) {
    feedback.resetAt = new Date(reset * 1000);
    feedback.retryAfterMs = Math.max(0, reset * 1000 - now);
  }

  const retryAfter = parseRetryAfter(raw['retry-after'], now);
  if (retryAfter !== undefined) {
    feedback.retryAfterMs = retryAfter;
    feedback.resetAt = new Date(now + retryAfter);
  }
  return feedback;
};
