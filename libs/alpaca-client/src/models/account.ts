import { z } from 'zod';

export const accountSchema = z.object({
  id: z.string(),
  account_number: z.string(),
  status: z.string(),
  currency: z.string(),
  cash: z.string(),
  portfolio_value: z.string().optional(),
  equity: z.string(),
  last_equity: z.string(),
  buying_power: z.string(),
  regt_buying_power: z.string().optional(),
  daytrading_buying_power: z.string().optional(),
  non_marginable_buying_power: z.string().optional(),
  long_market_value: z.string(),
  short_market_value: z.string(),
  initial_margin: z.string().optional(),
  maintenance_margin: z.string().optional(),
  last_maintenance_margin: z.string().optional(),
  sma: z.string().optional(),
  multiplier: z.string().optional(),
  daytrade_count: z.number().int(),
  pattern_day_trader: z.boolean(),
  trading_blocked: z.boolean(),
  transfers_blocked: z.boolean(),
  account_blocked: z.boolean(),
  trade_suspended_by_user: z.boolean().optional(),
  shorting_enabled: z.boolean(),
  crypto_status: z.string().optional(),
  created_at: z.string(),
});

export type Account = z.infer<typeof accountSchema>;
