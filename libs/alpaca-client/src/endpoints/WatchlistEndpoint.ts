import { z } from 'zod';
import { watchlistSchema } from '../models/watchlist';
import type { Watchlist } from '../models/watchlist';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint } from './AbstractEndpoint';

export class WatchlistEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/watchlists', 'watchlist');
  }

  list(options?: CallOptions): Promise<Watchlist[]> {
    return this.call('list', { method: 'GET', path: this.path(), schema: z.array(watchlistSchema) }, options);
  }

  create(name: string, symbols: string[] = [], options?: CallOptions): Promise<Watchlist> {
    return this.call(
      'create',
      { method: 'POST', path: this.path(), body: { name, symbols }, schema: watchlistSchema },
      options,
    );
  }

  get(watchlistId: string, options?: CallOptions): Promise<Watchlist> {
    return this.call('get', { method: 'GET', path: this.path(watchlistId), schema: watchlistSchema }, options);
  }

  /** Renames the watchlist and/or replaces its symbols. */
  update(watchlistId: string, changes: { name?: string; symbols?: string[] }, options?: CallOptions): Promise<Watchlist> {
    return this.call(
      'update',
      {
        method: 'PUT',
        path: this.path(watchlistId),
        body: { name: changes.name, symbols: changes.symbols },
        schema: watchlistSchema,
      },
      options,
    );
  }

  addAsset(watchlistId: string, symbol: string, options?: CallOptions): Promise<Watchlist> {
    return this.call(
      'addAsset',
      { method: 'POST', path: this.path(watchlistId), body: { symbol }, schema: watchlistSchema },
      options,
    );
  }

  removeSymbol(watchlistId: string, symbol: string, options?: CallOptions): Promise<Watchlist> {
    return this.call(
      'removeSymbol',
      { method: 'DELETE', path: this.path(watchlistId, symbol), schema: watchlistSchema },
      options,
    );
  }

  delete(watchlistId: string, options?: CallOptions): Promise<void> {
    return this.call('delete', { method: 'DELETE', path: this.path(watchlistId), schema: z.void() }, options);
  }
}
