import fs from 'node:fs';
import { z } from 'zod';
import type { AggregateSpec } from '../services/continuous-aggregate.js';
import type { CompressionPolicy, RetentionPolicy } from '../services/lifecycle.service.js';
import { AGGREGATE_FNS, CANDLE_METRICS } from '../services/rollup.service.js';
import { TIMEFRAMES } from '../types/domain.js';
import { parseDuration } from '../utils/duration.js';

// milliseconds, or an interval string such as "7 days" / "5m"
export const Duration = z.union([z.number().int().nonnegative(), z.string().min(1)]).transform((v, ctx) => {
  try {
    return parseDuration(v);
  } catch (e) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: e instanceof Error ? e.message : String(e) });
    return z.NEVER;
  }
});

const Identifier = z.string().regex(/^[a-z_][a-z0-9_.]*$/i);

const RuleSpec = z.object({
  fn: z.enum(AGGREGATE_FNS),
  column: z.string().min(1).optional(),
});

export const AggregateConfig = z
  .object({
    name: z.string().regex(/^[a-z_][a-z0-9_]*$/),
    source: z.union([z.literal('ticks'), z.enum(TIMEFRAMES)]),
    timeframe: z.enum(TIMEFRAMES),
    columns: z.record(z.enum(CANDLE_METRICS), RuleSpec).optional(),
    start_offset: Duration,
    end_offset: Duration,
    refresh_interval: Duration,
  })
  .transform((c): AggregateSpec => ({
    name: c.name,
    source: c.source,
    timeframe: c.timeframe,
    columns: c.columns,
    startOffsetMs: c.start_offset,
    endOffsetMs: c.end_offset,
    refreshIntervalMs: c.refresh_interval,
  }));

const ORDER_BY_RX = /^\s*([a-z_][a-z0-9_]*)(?:\s+(asc|desc))?\s*$/i;

const OrderBy = z
  .string()
  .default('time DESC')
  .transform((v, ctx) => {
    const m = ORDER_BY_RX.exec(v);
    if (!m) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid order_by "${v}"` });
      return z.NEVER;
    }
    return { column: m[1], direction: m[2]?.toLowerCase() === 'desc' ? ('desc' as const) : ('asc' as const) };
  });

const SegmentBy = z
  .union([z.string(), z.array(z.string().min(1))])
  .default(['symbol'])
  .transform((v) => (typeof v === 'string' ? v.split(',').map((s) => s.trim()).filter(Boolean) : v));

export const CompressionConfig = z
  .object({
    table: Identifier,
    segment_by: SegmentBy,
    order_by: OrderBy,
    age_threshold: Duration,
  })
  .transform((c): CompressionPolicy => ({
    table: c.table,
    layout: { segmentBy: c.segment_by, orderBy: c.order_by },
    ageThresholdMs: c.age_threshold,
  }));

export const RetentionConfig = z
  .object({
    table: Identifier,
    age_threshold: Duration,
  })
  .transform((c): RetentionPolicy => ({ table: c.table, ageThresholdMs: c.age_threshold }));

export const PoliciesFile = z.object({
  aggregates: z.array(AggregateConfig).default([]),
  compression: z.array(CompressionConfig).default([]),
  retention: z.array(RetentionConfig).default([]),
});
export type Policies = z.output<typeof PoliciesFile>;

/** What a fresh deployment runs with when no policies file is given. */
export const DEFAULT_POLICIES = {
  aggregates: [
    { name: 'ohlcv_1m', source: 'ticks', timeframe: '1m', start_offset: '1 hour', end_offset: '1 minute', refresh_interval: '1 minute' },
    { name: 'ohlcv_5m', source: '1m', timeframe: '5m', start_offset: '4 hours', end_offset: '5 minutes', refresh_interval: '5 minutes' },
  ],
  compression: [
    { table: 'market_ticks', segment_by: 'symbol', order_by: 'time DESC', age_threshold: '7 days' },
    { table: 'ohlcv_1m', segment_by: 'symbol, timeframe', order_by: 'time DESC', age_threshold: '7 days' },
    { table: 'ohlcv_5m', segment_by: 'symbol, timeframe', order_by: 'time DESC', age_threshold: '7 days' },
  ],
  retention: [{ table: 'market_ticks', age_threshold: '1 year' }],
};

export function loadPolicies(file?: string | URL): Policies {
  if (!file) return PoliciesFile.parse(DEFAULT_POLICIES);
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return PoliciesFile.parse(raw);
}
