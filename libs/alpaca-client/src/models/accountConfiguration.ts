import { z } from 'zod';

export const accountConfigurationSchema = z.object({
  dtbp_check: z.enum(['both', 'entry', 'exit']),
  trade_confirm_email: z.enum(['all', 'none']),
  suspend_trade: z.boolean(),
  no_shorting: z.boolean(),
  fractional_trading: z.boolean().optional(),
  max_margin_multiplier: z.string().optional(),
  pdt_check: z.enum(['both', 'entry', 'exit']).optional(),
});

export type AccountConfiguration = z.infer<typeof accountConfigurationSchema>;
