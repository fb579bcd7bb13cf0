import { z } from 'zod';

export const positionSchema = z.object({
  asset_id: z.string(),
  symbol: z.string(),
  exchange: z.string(),
  asset_class: z.string(),
  avg_entry_price: z.string(),
  qty: z.string(),
  qty_available: z.string().optional(),
  side: z.enum(['long', 'short']),
  market_value: z.string().nullish(),
  cost_basis: z.string(),
  unrealized_pl: z.string().nullish(),
  unrealized_plpc: z.string().nullish(),
  unrealized_intraday_pl: z.string().nullish(),
  unrealized_intraday_plpc: z.string().nullish(),
  current_price: z.string().nullish(),
  lastday_price: z.string().nullish(),
  change_today: z.string().nullish(),
});

export type Position = z.infer<typeof positionSchema>;

/** One entry of the close-all response. `body` is the closing order or an error. */
export const closedPositionSchema = z.object({
  symbol: z.string(),
  status: z.number().int(),
  body: z.unknown().optional(),
});

export type ClosedPosition = z.infer<typeof closedPositionSchema>;
