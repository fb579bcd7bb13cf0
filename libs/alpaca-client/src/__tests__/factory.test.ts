import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '@alpaca-sdk/resilient-http-core';
import { createAlpacaAPI } from '../factory';
import { MARKET_CLOCK, createFakeClock, createRoutedTransport, createTestLogger, json } from './fixtures';

const ENV_KEYS = [
  'APCA_API_KEY_ID',
  'APCA_API_SECRET_KEY',
  'APCA_API_OAUTH_TOKEN',
  'APCA_ENDPOINT_API_TYPE',
  'APCA_DATA_API_TYPE',
  'APCA_MAX_ATTEMPTS',
  'APCA_BASE_BACKOFF_MS',
  'APCA_MAX_BACKOFF_MS',
  'APCA_OVERALL_TIMEOUT_MS',
  'APCA_ATTEMPT_TIMEOUT_MS',
];

describe('createAlpacaAPI', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) {
      vi.stubEnv(key, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads the key pair from the environment and defaults to paper and IEX', async () => {
    vi.stubEnv('APCA_API_KEY_ID', 'test-key');
    vi.stubEnv('APCA_API_SECRET_KEY', 'test-secret');
    const { transport, lastRequest } = createRoutedTransport({
      'GET /v2/stocks/AAPL/trades/latest': json(200, {
        symbol: 'AAPL',
        trade: { t: '2024-01-02T15:00:00Z', x: 'V', p: 1, s: 1, i: 1, z: 'C' },
      }),
    });

    const api = createAlpacaAPI({ transport, logger: createTestLogger() });
    await api.requireMarketData().getLatestTrade('AAPL');

    expect(api.getBrokerClient().baseUrl).toBe('https://paper-api.alpaca.markets/v2');
    expect(lastRequest().url).toBe('https://data.alpaca.markets/v2/stocks/AAPL/trades/latest?feed=iex');
    expect(lastRequest().headers).toEqual({
      Accept: 'application/json',
      'APCA-API-KEY-ID': 'test-key',
      'APCA-API-SECRET-KEY': 'test-secret',
    });
  });

  it('honours the endpoint and data types from the environment', () => {
    vi.stubEnv('APCA_API_KEY_ID', 'test-key');
    vi.stubEnv('APCA_API_SECRET_KEY', 'test-secret');
    vi.stubEnv('APCA_ENDPOINT_API_TYPE', 'live');
    vi.stubEnv('APCA_DATA_API_TYPE', 'SIP');
    const logger = createTestLogger();

    const api = createAlpacaAPI({ logger });

    expect(api.getBrokerClient().baseUrl).toBe('https://live.alpaca.markets/v2');
    expect(logger.info).toHaveBeenCalledWith('alpaca.api.created', expect.objectContaining({ dataApiType: 'SIP' }));
  });

  it('rejects unknown API types', () => {
    vi.stubEnv('APCA_API_KEY_ID', 'test-key');
    vi.stubEnv('APCA_API_SECRET_KEY', 'test-secret');
    vi.stubEnv('APCA_ENDPOINT_API_TYPE', 'sandbox');

    expect(() => createAlpacaAPI({ logger: createTestLogger() })).toThrow(ConfigurationError);
  });

  it('rejects a missing key pair', () => {
    expect(() => createAlpacaAPI({ logger: createTestLogger() })).toThrow(
      'No credentials provided: set keyId and secretKey, or oauthToken',
    );
  });

  it('lets override credentials replace the environment ones', () => {
    vi.stubEnv('APCA_API_KEY_ID', 'test-key');
    vi.stubEnv('APCA_API_SECRET_KEY', 'test-secret');

    const api = createAlpacaAPI({ oauthToken: 'test-token', logger: createTestLogger() });

    expect(api.marketData()).toBeNull();
  });

  it('reads the OAuth token from the environment', () => {
    vi.stubEnv('APCA_API_OAUTH_TOKEN', 'test-token');

    const api = createAlpacaAPI({ logger: createTestLogger() });

    expect(api.getDataClient()).toBeNull();
  });

  it('reads retry settings and ignores unparseable numbers', async () => {
    vi.stubEnv('APCA_API_KEY_ID', 'test-key');
    vi.stubEnv('APCA_API_SECRET_KEY', 'test-secret');
    vi.stubEnv('APCA_MAX_ATTEMPTS', '2');
    vi.stubEnv('APCA_BASE_BACKOFF_MS', 'soon');
    const fake = createFakeClock();
    const transport = vi.fn(async () => json(200, MARKET_CLOCK)).mockRejectedValue(new Error('ECONNREFUSED'));

    const api = createAlpacaAPI({ transport, clock: fake.clock, logger: createTestLogger(), resilience: { jitterFactor: 0 } });

    await expect(api.clock().get()).rejects.toMatchObject({ reason: 'ConnectionFailed', attempts: 2 });
    expect(fake.sleeps).toEqual([250]);
  });
});
