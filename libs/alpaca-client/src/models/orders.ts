import { z } from 'zod';

export const orderSideSchema = z.enum(['buy', 'sell']);
export const orderTypeSchema = z.enum(['market', 'limit', 'stop', 'stop_limit', 'trailing_stop']);
export const timeInForceSchema = z.enum(['day', 'gtc', 'opg', 'cls', 'ioc', 'fok']);
export const orderClassSchema = z.enum(['simple', 'bracket', 'oco', 'oto', '']);

export type OrderSide = z.infer<typeof orderSideSchema>;
export type OrderType = z.infer<typeof orderTypeSchema>;
export type TimeInForce = z.infer<typeof timeInForceSchema>;
export type OrderClass = Exclude<z.infer<typeof orderClassSchema>, ''>;

const baseOrderSchema = z.object({
  id: z.string(),
  client_order_id: z.string(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  submitted_at: z.string().nullish(),
  filled_at: z.string().nullish(),
  expired_at: z.string().nullish(),
  canceled_at: z.string().nullish(),
  failed_at: z.string().nullish(),
  replaced_at: z.string().nullish(),
  replaced_by: z.string().nullish(),
  replaces: z.string().nullish(),
  asset_id: z.string(),
  symbol: z.string(),
  asset_class: z.string(),
  notional: z.string().nullish(),
  qty: z.string().nullish(),
  filled_qty: z.string(),
  filled_avg_price: z.string().nullish(),
  order_class: orderClassSchema.optional(),
  type: orderTypeSchema,
  side: orderSideSchema,
  time_in_force: timeInForceSchema,
  limit_price: z.string().nullish(),
  stop_price: z.string().nullish(),
  trail_percent: z.string().nullish(),
  trail_price: z.string().nullish(),
  hwm: z.string().nullish(),
  status: z.string(),
  extended_hours: z.boolean(),
});

export type Order = z.infer<typeof baseOrderSchema> & {
  legs?: Order[] | null;
};

export const orderSchema: z.ZodType<Order, z.ZodTypeDef, unknown> = baseOrderSchema.extend({
  legs: z.lazy(() => z.array(orderSchema)).nullish(),
});

/** One entry of the cancel-all response. `body` is the order or the error for that order. */
export const cancelledOrderSchema = z.object({
  id: z.string(),
  status: z.number().int(),
  body: z.unknown().optional(),
});

export type CancelledOrder = z.infer<typeof cancelledOrderSchema>;

export type Decimal = number | string;

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  timeInForce: TimeInForce;
  /** Exactly one of `qty` and `notional`. */
  qty?: Decimal;
  notional?: Decimal;
  limitPrice?: Decimal;
  stopPrice?: Decimal;
  trailPrice?: Decimal;
  trailPercent?: Decimal;
  extendedHours?: boolean;
  clientOrderId?: string;
  orderClass?: OrderClass;
  takeProfit?: { limitPrice: Decimal };
  stopLoss?: { stopPrice: Decimal; limitPrice?: Decimal };
}

export interface ReplaceOrderRequest {
  qty?: Decimal;
  timeInForce?: TimeInForce;
  limitPrice?: Decimal;
  stopPrice?: Decimal;
  trail?: Decimal;
  clientOrderId?: string;
}
