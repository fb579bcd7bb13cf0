import { z } from 'zod';
import { orderSchema } from '../models/orders';
import type { Order } from '../models/orders';
import { closedPositionSchema, positionSchema } from '../models/positions';
import type { ClosedPosition, Position } from '../models/positions';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint, decimal } from './AbstractEndpoint';

export interface ClosePositionParams {
  /** Shares to liquidate. Mutually exclusive with `percentage`. */
  qty?: number | string;
  percentage?: number | string;
}

export class PositionsEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/positions', 'positions');
  }

  list(options?: CallOptions): Promise<Position[]> {
    return this.call('list', { method: 'GET', path: this.path(), schema: z.array(positionSchema) }, options);
  }

  get(symbolOrAssetId: string, options?: CallOptions): Promise<Position> {
    return this.call('get', { method: 'GET', path: this.path(symbolOrAssetId), schema: positionSchema }, options);
  }

  /**
   * Liquidates all or part of a position; resolves with the closing order.
   * Places a market order, so it is not retried after a lost response.
   */
  close(symbolOrAssetId: string, params: ClosePositionParams = {}, options?: CallOptions): Promise<Order> {
    return this.call(
      'close',
      {
        method: 'DELETE',
        path: this.path(symbolOrAssetId),
        query: { qty: decimal(params.qty), percentage: decimal(params.percentage) },
        schema: orderSchema,
        idempotent: false,
      },
      options,
    );
  }

  closeAll(params: { cancelOrders?: boolean } = {}, options?: CallOptions): Promise<ClosedPosition[]> {
    return this.call(
      'closeAll',
      {
        method: 'DELETE',
        path: this.path(),
        query: { cancel_orders: params.cancelOrders },
        schema: z.array(closedPositionSchema),
        idempotent: false,
      },
      options,
    );
  }
}
