import { z } from 'zod';
import { cancelledOrderSchema, orderSchema } from '../models/orders';
import type { CancelledOrder, Order, OrderRequest, ReplaceOrderRequest } from '../models/orders';
import type { AlpacaClient } from '../alpacaClient';
import type { CallOptions } from '../types';
import { AbstractEndpoint, decimal } from './AbstractEndpoint';

export interface ListOrdersParams {
  status?: 'open' | 'closed' | 'all';
  limit?: number;
  /** Only orders submitted after this time. */
  after?: string | Date;
  until?: string | Date;
  direction?: 'asc' | 'desc';
  /** Roll multi-leg orders up under their parent. */
  nested?: boolean;
  symbols?: string[];
}

const toOrderBody = (request: OrderRequest) => ({
  symbol: request.symbol,
  qty: decimal(request.qty),
  notional: decimal(request.notional),
  side: request.side,
  type: request.type,
  time_in_force: request.timeInForce,
  limit_price: decimal(request.limitPrice),
  stop_price: decimal(request.stopPrice),
  trail_price: decimal(request.trailPrice),
  trail_percent: decimal(request.trailPercent),
  extended_hours: request.extendedHours,
  client_order_id: request.clientOrderId,
  order_class: request.orderClass,
  take_profit: request.takeProfit && { limit_price: decimal(request.takeProfit.limitPrice) },
  stop_loss: request.stopLoss && {
    stop_price: decimal(request.stopLoss.stopPrice),
    limit_price: decimal(request.stopLoss.limitPrice),
  },
});

const toReplaceBody = (request: ReplaceOrderRequest) => ({
  qty: decimal(request.qty),
  time_in_force: request.timeInForce,
  limit_price: decimal(request.limitPrice),
  stop_price: decimal(request.stopPrice),
  trail: decimal(request.trail),
  client_order_id: request.clientOrderId,
});

export class OrdersEndpoint extends AbstractEndpoint {
  constructor(client: AlpacaClient) {
    super(client, '/orders', 'orders');
  }

  list(params: ListOrdersParams = {}, options?: CallOptions): Promise<Order[]> {
    return this.call(
      'list',
      {
        method: 'GET',
        path: this.path(),
        query: {
          status: params.status,
          limit: params.limit,
          after: params.after,
          until: params.until,
          direction: params.direction,
          nested: params.nested,
          symbols: params.symbols,
        },
        schema: z.array(orderSchema),
      },
      options,
    );
  }

  get(orderId: string, nested?: boolean, options?: CallOptions): Promise<Order> {
    return this.call(
      'get',
      { method: 'GET', path: this.path(orderId), query: { nested }, schema: orderSchema },
      options,
    );
  }

  getByClientId(clientOrderId: string, options?: CallOptions): Promise<Order> {
    return this.call(
      'getByClientId',
      {
        method: 'GET',
        path: `${this.basePath}:by_client_order_id`,
        query: { client_order_id: clientOrderId },
        schema: orderSchema,
      },
      options,
    );
  }

  /**
   * Places an order. Not retried on 5xx or connection failures unless
   * `options.resilience.retryNonIdempotent` is set; pass a `clientOrderId` to
   * make a retried submission detectable.
   */
  submit(request: OrderRequest, options?: CallOptions): Promise<Order> {
    return this.call(
      'submit',
      { method: 'POST', path: this.path(), body: toOrderBody(request), schema: orderSchema },
      options,
    );
  }

  replace(orderId: string, patch: ReplaceOrderRequest, options?: CallOptions): Promise<Order> {
    return this.call(
      'replace',
      { method: 'PATCH', path: this.path(orderId), body: toReplaceBody(patch), schema: orderSchema },
      options,
    );
  }

  cancel(orderId: string, options?: CallOptions): Promise<void> {
    return this.call('cancel', { method: 'DELETE', path: this.path(orderId), schema: z.void() }, options);
  }

  /** Cancels every open order. One entry per order, each with its own HTTP status. */
  cancelAll(options?: CallOptions): Promise<CancelledOrder[]> {
    return this.call(
      'cancelAll',
      { method: 'DELETE', path: this.path(), schema: z.array(cancelledOrderSchema), idempotent: false },
      options,
    );
  }
}
