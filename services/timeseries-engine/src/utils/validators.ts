import { z } from 'zod';
import { TIMEFRAMES } from '../types/domain.js';

// epoch milliseconds, a numeric string, or an ISO-8601 timestamp
export const Timestamp = z.union([z.number(), z.string().min(1)]).transform((v, ctx) => {
  const ms = typeof v === 'number' ? v : /^-?\d+(\.\d+)?$/.test(v.trim()) ? Number(v) : Date.parse(v);
  if (!Number.isFinite(ms)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid timestamp "${v}"` });
    return z.NEVER;
  }
  return ms;
});

const Price = z.number().finite();
const Size = z.number().finite().nonnegative();

export const TickItem = z.object({
  kind: z.literal('tick'),
  symbol: z.string().min(1),
  time: Timestamp,
  bid: Price,
  ask: Price,
  bidSize: Size.optional(),
  askSize: Size.optional(),
});

export const CandleItem = z.object({
  kind: z.literal('candle'),
  symbol: z.string().min(1),
  timeframe: z.enum(TIMEFRAMES),
  time: Timestamp,
  open: Price,
  high: Price,
  low: Price,
  close: Price,
  volume: Size.optional(),
  tickVolume: z.number().int().nonnegative().optional(),
});

export const IngestItem = z.discriminatedUnion('kind', [TickItem, CandleItem]);
export type IngestItem = z.output<typeof IngestItem>;

// items are validated one by one so a bad item does not sink the batch
export const IngestBody = z.object({
  items: z.array(z.unknown()).min(1).max(10_000),
});

export const CandleParams = z.object({
  symbol: z.string().min(1),
  timeframe: z.enum(TIMEFRAMES),
});

export const RangeQuery = z.object({
  start: Timestamp,
  end: Timestamp.optional(),
});

export const LatestQuery = z.object({
  limit: z.coerce.number().optional(),
});

export const AtrQuery = z.object({
  period: z.coerce.number().optional(),
  start: Timestamp.optional(),
  end: Timestamp.optional(),
});

export const AverageQuery = z.object({
  period: z.coerce.number(),
  start: Timestamp.optional(),
  end: Timestamp.optional(),
});

export const ReprocessBody = z.object({
  start: Timestamp,
  end: Timestamp,
});

export const LifecycleRunBody = z.object({
  now: Timestamp.optional(),
});
