import { vi } from 'vitest';
import type { Clock, Logger, RawHttpResponse, TransportRequest } from '@alpaca-sdk/resilient-http-core';

export const json = (status: number, body?: unknown, headers: Record<string, string> = {}): RawHttpResponse => ({
  status,
  headers,
  body: body === undefined ? '' : JSON.stringify(body),
});

/**
 * In-process transport that answers from a `"METHOD /path"` route table.
 * Unknown routes get the service's 404 error body.
 */
export const createRoutedTransport = (routes: Record<string, RawHttpResponse | (() => RawHttpResponse)>) => {
  const transport = vi.fn(async (req: TransportRequest, _signal: AbortSignal): Promise<RawHttpResponse> => {
    const route = routes[`${req.method} ${new URL(req.url).pathname}`];
    if (!route) {
      return json(404, { code: 40410000, message: 'resource not found' });
    }
    return typeof route === 'function' ? route() : route;
  });

  const lastRequest = (): TransportRequest => {
    const call = transport.mock.calls[transport.mock.calls.length - 1];
    if (!call) {
      throw new Error('transport was not called');
    }
    return call[0];
  };

  return { transport, lastRequest };
};

export const createTestLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export const createFakeClock = (start = Date.UTC(2024, 0, 2, 15, 0, 0)) => {
  let current = start;
  const sleeps: number[] = [];
  const clock: Clock = {
    now: () => current,
    sleep: async (ms: number, signal?: AbortSignal) => {
      signal?.throwIfAborted();
      sleeps.push(ms);
      current += ms;
    },
  };
  return { clock, sleeps };
};

export const ACCOUNT = {
  id: 'acc-1',
  account_number: 'PA0000001',
  status: 'ACTIVE',
  currency: 'USD',
  cash: '1000.00',
  equity: '1550.00',
  last_equity: '1500.00',
  buying_power: '2000.00',
  long_market_value: '550.00',
  short_market_value: '0',
  daytrade_count: 0,
  pattern_day_trader: false,
  trading_blocked: false,
  transfers_blocked: false,
  account_blocked: false,
  shorting_enabled: true,
  created_at: '2024-01-02T14:00:00Z',
};

export const ORDER = {
  id: 'ord-1',
  client_order_id: 'cli-1',
  created_at: '2024-01-02T15:00:00Z',
  asset_id: 'asset-1',
  symbol: 'AAPL',
  asset_class: 'us_equity',
  qty: '1',
  filled_qty: '0',
  type: 'limit',
  side: 'buy',
  time_in_force: 'day',
  limit_price: '187.5',
  status: 'accepted',
  extended_hours: false,
};

export const ASSET = {
  id: 'asset-1',
  class: 'us_equity',
  exchange: 'NASDAQ',
  symbol: 'AAPL',
  name: 'Apple Inc.',
  status: 'active',
  tradable: true,
  marginable: true,
  shortable: true,
  easy_to_borrow: true,
  fractionable: true,
};

export const POSITION = {
  asset_id: 'asset-1',
  symbol: 'AAPL',
  exchange: 'NASDAQ',
  asset_class: 'us_equity',
  avg_entry_price: '100.00',
  qty: '5',
  side: 'long',
  market_value: '550.00',
  cost_basis: '500.00',
  current_price: '110.00',
};

export const WATCHLIST = {
  id: 'wl-1',
  account_id: 'acc-1',
  name: 'Tech',
  created_at: '2024-01-02T15:00:00Z',
  updated_at: '2024-01-02T15:00:00Z',
  assets: [ASSET],
};

export const MARKET_CLOCK = {
  timestamp: '2024-01-02T10:00:00-05:00',
  is_open: true,
  next_open: '2024-01-03T09:30:00-05:00',
  next_close: '2024-01-02T16:00:00-05:00',
};

export const ACCOUNT_CONFIGURATION = {
  dtbp_check: 'entry',
  trade_confirm_email: 'all',
  suspend_trade: false,
  no_shorting: false,
};

export const BAR = { t: '2024-01-02T05:00:00Z', o: 100.5, h: 102, l: 99.25, c: 101.75, v: 120000 };
export const TRADE = { t: '2024-01-02T15:00:00.5Z', x: 'V', p: 101.5, s: 100, c: ['@'], i: 52983525029461, z: 'C' };
export const QUOTE = { t: '2024-01-02T15:00:00.5Z', ax: 'V', ap: 101.6, as: 2, bx: 'V', bp: 101.4, bs: 3, c: ['R'], z: 'C' };
