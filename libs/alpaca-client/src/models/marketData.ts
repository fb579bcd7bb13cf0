import { z } from 'zod';

export const barSchema = z.object({
  t: z.string(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number(),
  n: z.number().optional(),
  vw: z.number().optional(),
});

export const tradeSchema = z.object({
  t: z.string(),
  x: z.string(),
  p: z.number(),
  s: z.number(),
  c: z.array(z.string()).nullish(),
  i: z.number(),
  z: z.string(),
});

export const quoteSchema = z.object({
  t: z.string(),
  ax: z.string(),
  ap: z.number(),
  as: z.number(),
  bx: z.string(),
  bp: z.number(),
  bs: z.number(),
  c: z.array(z.string()).nullish(),
  z: z.string().optional(),
});

export const barsPageSchema = z.object({
  symbol: z.string(),
  next_page_token: z.string().nullable(),
  bars: z.array(barSchema).nullable(),
});

export const tradesPageSchema = z.object({
  symbol: z.string(),
  next_page_token: z.string().nullable(),
  trades: z.array(tradeSchema).nullable(),
});

export const quotesPageSchema = z.object({
  symbol: z.string(),
  next_page_token: z.string().nullable(),
  quotes: z.array(quoteSchema).nullable(),
});

export const latestTradeSchema = z.object({
  symbol: z.string(),
  trade: tradeSchema,
});

export const latestQuoteSchema = z.object({
  symbol: z.string(),
  quote: quoteSchema,
});

export const snapshotSchema = z.object({
  symbol: z.string().optional(),
  latestTrade: tradeSchema.nullable(),
  latestQuote: quoteSchema.nullable(),
  minuteBar: barSchema.nullable(),
  dailyBar: barSchema.nullable(),
  prevDailyBar: barSchema.nullable(),
});

export type Bar = z.infer<typeof barSchema>;
export type Trade = z.infer<typeof tradeSchema>;
export type Quote = z.infer<typeof quoteSchema>;
export type BarsPage = z.infer<typeof barsPageSchema>;
export type TradesPage = z.infer<typeof tradesPageSchema>;
export type QuotesPage = z.infer<typeof quotesPageSchema>;
export type LatestTrade = z.infer<typeof latestTradeSchema>;
export type LatestQuote = z.infer<typeof latestQuoteSchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;
