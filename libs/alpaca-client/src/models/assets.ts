import { z } from 'zod';

export const assetSchema = z.object({
  id: z.string(),
  class: z.string(),
  exchange: z.string(),
  symbol: z.string(),
  name: z.string(),
  status: z.enum(['active', 'inactive']),
  tradable: z.boolean(),
  marginable: z.boolean(),
  shortable: z.boolean(),
  easy_to_borrow: z.boolean(),
  fractionable: z.boolean(),
  maintenance_margin_requirement: z.number().optional(),
  attributes: z.array(z.string()).optional(),
});

export type Asset = z.infer<typeof assetSchema>;
