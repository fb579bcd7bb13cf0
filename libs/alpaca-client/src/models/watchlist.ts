import { z } from 'zod';
import { assetSchema } from './assets';

export const watchlistSchema = z.object({
  id: z.string(),
  account_id: z.string(),
  name: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  assets: z.array(assetSchema).nullish(),
});

export type Watchlist = z.infer<typeof watchlistSchema>;
