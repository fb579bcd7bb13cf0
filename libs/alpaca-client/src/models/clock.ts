import { z } from 'zod';

export const marketClockSchema = z.object({
  timestamp: z.string(),
  is_open: z.boolean(),
  next_open: z.string(),
  next_close: z.string(),
});

export type MarketClock = z.infer<typeof marketClockSchema>;
