import { z } from 'zod';

export const tradeActivitySchema = z.object({
  id: z.string(),
  activity_type: z.literal('FILL'),
  transaction_time: z.string(),
  type: z.enum(['fill', 'partial_fill']),
  price: z.string(),
  qty: z.string(),
  side: z.string(),
  symbol: z.string(),
  leaves_qty: z.string(),
  order_id: z.string(),
  cum_qty: z.string(),
  order_status: z.string().optional(),
});

/** Dividends, fees, transfers, journal entries and the rest. */
export const nonTradeActivitySchema = z.object({
  id: z.string(),
  activity_type: z.string(),
  date: z.string(),
  net_amount: z.string(),
  symbol: z.string().optional(),
  qty: z.string().optional(),
  per_share_amount: z.string().optional(),
  description: z.string().optional(),
  status: z.string().optional(),
});

export const accountActivitySchema = z.union([tradeActivitySchema, nonTradeActivitySchema]);

export type TradeActivity = z.infer<typeof tradeActivitySchema>;
export type NonTradeActivity = z.infer<typeof nonTradeActivitySchema>;
export type AccountActivity = z.infer<typeof accountActivitySchema>;
