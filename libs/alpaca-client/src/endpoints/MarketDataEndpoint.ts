import { paginateAll } from '@alpaca-sdk/resilient-http-core';
import type { QueryParams, QueryTuple } from '@alpaca-sdk/resilient-http-core';
import {
  barsPageSchema,
  latestQuoteSchema,
  latestTradeSchema,
  quotesPageSchema,
  snapshotSchema,
  tradesPageSchema,
} from '../models/marketData';
import type {
  Bar,
  BarsPage,
  LatestQuote,
  LatestTrade,
  QuotesPage,
  Snapshot,
  TradesPage,
} from '../models/marketData';
import type { AlpacaClient } from '../alpacaClient';
import { feedFor } from '../credentials';
import type { CallOptions, DataAPIType } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export type BarTimeframe = `${number}${'Min' | 'Hour' | 'Day' | 'Week' | 'Month'}`;

interface RangeParams {
  start?: string | Date;
  end?: string | Date;
  limit?: number;
  pageToken?: string;
  sort?: 'asc' | 'desc';
}

export interface BarsParams extends RangeParams {
  timeframe: BarTimeframe;
  adjustment?: 'raw' | 'split' | 'dividend' | 'all';
}

export type TradesParams = RangeParams;
export type QuotesParams = RangeParams;

export interface PaginationLimits {
  maxPages?: number;
  maxItems?: number;
}

/**
 * Historical and latest stock data. Routed through the data client; every
 * request carries the `feed` matching the configured {@link DataAPIType}.
 */
export class MarketDataEndpoint extends AbstractEndpoint {
  private readonly feed: 'iex' | 'sip';

  constructor(client: AlpacaClient, dataApiType: DataAPIType) {
    super(client, '/stocks', 'marketData');
    this.feed = feedFor(dataApiType);
  }

  getBars(symbol: string, params: BarsParams, options?: CallOptions): Promise<BarsPage> {
    return this.call(
      'getBars',
      {
        method: 'GET',
        path: this.path(symbol, 'bars'),
        query: this.withFeed([
          ['timeframe', params.timeframe],
          ...rangeQuery(params),
          ['adjustment', params.adjustment],
        ]),
        schema: barsPageSchema,
      },
      options,
    );
  }

  /**
   * Follows `next_page_token` until the range is exhausted or a limit is hit.
   */
  async getAllBars(
    symbol: string,
    params: Omit<BarsParams, 'pageToken'>,
    limits: PaginationLimits = {},
    options?: CallOptions,
  ): Promise<Bar[]> {
    const result = await paginateAll(
      (pageToken) => this.getBars(symbol, { ...params, pageToken }, options),
      {
        extractItems: (page: BarsPage) => page.bars ?? [],
        getNextToken: (page) => page.next_page_token,
        maxPages: limits.maxPages,
        maxItems: limits.maxItems,
      },
    );
    return result.items;
  }

  getTrades(symbol: string, params: TradesParams = {}, options?: CallOptions): Promise<TradesPage> {
    return this.call(
      'getTrades',
      { method: 'GET', path: this.path(symbol, 'trades'), query: this.withFeed(rangeQuery(params)), schema: tradesPageSchema },
      options,
    );
  }

  getQuotes(symbol: string, params: QuotesParams = {}, options?: CallOptions): Promise<QuotesPage> {
    return this.call(
      'getQuotes',
      { method: 'GET', path: this.path(symbol, 'quotes'), query: this.withFeed(rangeQuery(params)), schema: quotesPageSchema },
      options,
    );
  }

  getLatestTrade(symbol: string, options?: CallOptions): Promise<LatestTrade> {
    return this.call(
      'getLatestTrade',
      { method: 'GET', path: this.path(symbol, 'trades', 'latest'), query: this.withFeed([]), schema: latestTradeSchema },
      options,
    );
  }

  getLatestQuote(symbol: string, options?: CallOptions): Promise<LatestQuote> {
    return this.call(
      'getLatestQuote',
      { method: 'GET', path: this.path(symbol, 'quotes', 'latest'), query: this.withFeed([]), schema: latestQuoteSchema },
      options,
    );
  }

  getSnapshot(symbol: string, options?: CallOptions): Promise<Snapshot> {
    return this.call(
      'getSnapshot',
      { method: 'GET', path: this.path(symbol, 'snapshot'), query: this.withFeed([]), schema: snapshotSchema },
      options,
    );
  }

  private withFeed(query: readonly QueryTuple[]): QueryParams {
    const feed: QueryTuple = ['feed', this.feed];
    return [...query, feed];
  }
}

const rangeQuery = (params: RangeParams): QueryTuple[] => [
  ['start', params.start],
  ['end', params.end],
  ['limit', params.limit],
  ['page_token', params.pageToken],
  ['sort', params.sort],
];
