import { z } from 'zod';

const series = z.array(z.number().nullable());

export const portfolioHistorySchema = z.object({
  timestamp: z.array(z.number().int()),
  equity: series,
  profit_loss: series,
  profit_loss_pct: series,
  base_value: z.number(),
  timeframe: z.string(),
});

export type PortfolioHistory = z.infer<typeof portfolioHistorySchema>;
