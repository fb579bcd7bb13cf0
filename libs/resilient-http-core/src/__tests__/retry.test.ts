import { describe, expect, it } from 'vitest';
import {
  DEFAULT_RESILIENCE,
  MAX_TIMER_DELAY_MS,
  computeBackoff,
  extractRateLimit,
  isRetryable,
  parseRetryAfter,
  resolveResilience,
  statusToCategory,
} from '../retry';

const NOW = Date.UTC(2024, 0, 2, 15, 0, 0);

describe('resolveResilience', () => {
  it('returns the defaults when nothing is overridden', () => {
    expect(resolveResilience()).toEqual(DEFAULT_RESILIENCE);
  });

  it('applies later profiles over earlier ones and ignores undefined values', () => {
    const resolved = resolveResilience({ maxAttempts: 3, baseBackoffMs: 100 }, { maxAttempts: undefined, jitterFactor: 0 });

    expect(resolved.maxAttempts).toBe(3);
    expect(resolved.baseBackoffMs).toBe(100);
    expect(resolved.jitterFactor).toBe(0);
  });

  it('never allows fewer than one attempt', () => {
    expect(resolveResilience({ maxAttempts: 0 }).maxAttempts).toBe(1);
  });

  it('falls back to the defaults for non-finite numbers', () => {
    const resolved = resolveResilience({ maxAttempts: Number.NaN, baseBackoffMs: Infinity, jitterFactor: Number.NaN });

    expect(resolved.maxAttempts).toBe(5);
    expect(resolved.baseBackoffMs).toBe(250);
    expect(resolved.jitterFactor).toBe(0.2);
  });

  it('clamps delays to the range a timer can wait', () => {
    const resolved = resolveResilience({ perAttemptTimeoutMs: 3e9, overallTimeoutMs: 3e9, maxBackoffMs: -5 });

    expect(resolved.perAttemptTimeoutMs).toBe(MAX_TIMER_DELAY_MS);
    expect(resolved.overallTimeoutMs).toBe(2_147_483_647);
    expect(resolved.maxBackoffMs).toBe(0);
  });
});

describe('statusToCategory', () => {
  const retryable = DEFAULT_RESILIENCE.retryableStatuses;

  it.each([
    [200, 'none'],
    [204, 'none'],
    [400, 'validation'],
    [401, 'auth'],
    [403, 'auth'],
    [404, 'not_found'],
    [422, 'validation'],
    [429, 'rate_limit'],
    [500, 'transient'],
    [503, 'transient'],
    [501, 'unknown'],
  ] as const)('maps %i to %s', (status, category) => {
    expect(statusToCategory(status, retryable)).toBe(category);
  });
});

describe('isRetryable', () => {
  const profile = resolveResilience();

  it('retries transient failures for idempotent methods only', () => {
    expect(isRetryable('transient', 'GET', profile)).toBe(true);
    expect(isRetryable('network', 'DELETE', profile)).toBe(true);
    expect(isRetryable('timeout', 'POST', profile)).toBe(false);
    expect(isRetryable('transient', 'PATCH', profile)).toBe(false);
  });

  it('lets the caller mark a request non-idempotent', () => {
    expect(isRetryable('network', 'DELETE', profile, false)).toBe(false);
    expect(isRetryable('timeout', 'DELETE', resolveResilience({ retryNonIdempotent: true }), false)).toBe(true);
    expect(isRetryable('rate_limit', 'DELETE', profile, false)).toBe(true);
  });

  it('retries POST when retryNonIdempotent is set', () => {
    expect(isRetryable('network', 'POST', resolveResilience({ retryNonIdempotent: true }))).toBe(true);
  });

  it('retries rate limiting for every method', () => {
    expect(isRetryable('rate_limit', 'POST', profile)).toBe(true);
  });

  it('never retries client errors or when retries are off', () => {
    expect(isRetryable('validation', 'GET', profile)).toBe(false);
    expect(isRetryable('auth', 'GET', profile)).toBe(false);
    expect(isRetryable('network', 'GET', resolveResilience({ retryEnabled: false }))).toBe(false);
  });
});

describe('computeBackoff', () => {
  const profile = { baseBackoffMs: 250, maxBackoffMs: 8000, jitterFactor: 0.2 };

  it('doubles per attempt up to the cap', () => {
    const noJitter = { ...profile, jitterFactor: 0 };
    expect([1, 2, 3, 6, 7, 10].map((attempt) => computeBackoff(attempt, noJitter))).toEqual([
      250, 500, 1000, 8000, 8000, 8000,
    ]);
  });

  it('spreads the delay by the jitter factor', () => {
    expect(computeBackoff(1, profile, () => 0)).toBe(200);
    expect(computeBackoff(1, profile, () => 0.5)).toBe(250);
    expect(computeBackoff(1, profile, () => 1)).toBe(300);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds', () => {
    expect(parseRetryAfter('3', NOW)).toBe(3000);
    expect(parseRetryAfter('0', NOW)).toBe(0);
  });

  it('reads HTTP dates relative to now', () => {
    expect(parseRetryAfter(new Date(NOW + 4000).toUTCString(), NOW)).toBe(4000);
    expect(parseRetryAfter(new Date(NOW - 4000).toUTCString(), NOW)).toBe(0);
  });

  it('ignores missing, negative and garbage values', () => {
    expect(parseRetryAfter(undefined, NOW)).toBeUndefined();
    expect(parseRetryAfter('-1', NOW)).toBeUndefined();
    expect(parseRetryAfter('soon', NOW)).toBeUndefined();
  });
});

describe('extractRateLimit', () => {
  it('returns undefined without rate-limit headers', () => {
    expect(extractRateLimit({ 'content-type': 'application/json' }, NOW)).toBeUndefined();
  });

  it('reads limit, remaining and reset', () => {
    const reset = String(NOW / 1000 + 30);
    const feedback = extractRateLimit(
      { 'x-ratelimit-limit': '200', 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': reset },
      NOW,
    );

    expect(feedback).toEqual({
      limit: 200,
      remaining: 0,
      resetAt: new Date(NOW + 30_000),
      retryAfterMs: 30_000,
      raw: { 'x-ratelimit-limit': '200', 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': reset },
    });
  });

  it('prefers Retry-After over the reset time', () => {
    const feedback = extractRateLimit({ 'x-ratelimit-reset': String(NOW / 1000 + 30), 'retry-after': '2' }, NOW);

    expect(feedback?.retryAfterMs).toBe(2000);
    expect(feedback?.resetAt).toEqual(new Date(NOW + 2000));
  });
});
