import { InvalidArgumentError } from '../errors.js';
import { roundTo } from '../store/market-store.js';
import type { CandleRow, TimeRow, Timeframe } from '../types/domain.js';

export function bucketStart(time: number, widthMs: number): number {
  return Math.floor(time / widthMs) * widthMs;
}

export const AGGREGATE_FNS = ['first', 'last', 'max', 'min', 'sum', 'count', 'avg'] as const;
export type AggregateFn = (typeof AGGREGATE_FNS)[number];

export const CANDLE_METRICS = [
  'open', 'high', 'low', 'close', 'volume', 'tickVolume', 'spreadAvg', 'spreadMax', 'spreadMin',
] as const;
export type CandleMetric = (typeof CANDLE_METRICS)[number];

const PRICE_METRICS = ['open', 'high', 'low', 'close'] as const;

/** Rule as configured: an aggregate function over a named source column. */
export type RuleSpec = { fn: AggregateFn; column?: string };
export type RuleSpecs = Partial<Record<CandleMetric, RuleSpec>>;

export type ColumnRule<R> = { fn: AggregateFn; get: (row: R) => number | null };

export type RollupRules<R> = Record<(typeof PRICE_METRICS)[number], ColumnRule<R>> &
  Partial<Record<Exclude<CandleMetric, (typeof PRICE_METRICS)[number]>, ColumnRule<R>>>;

export const TICK_RULE_DEFAULTS: RuleSpecs = {
  open: { fn: 'first', column: 'mid' },
  high: { fn: 'max', column: 'mid' },
  low: { fn: 'min', column: 'mid' },
  close: { fn: 'last', column: 'mid' },
  tickVolume: { fn: 'count' },
  spreadAvg: { fn: 'avg', column: 'spread' },
  spreadMax: { fn: 'max', column: 'spread' },
  spreadMin: { fn: 'min', column: 'spread' },
};

// a coarser candle takes open/close from its first/last sub-candle
export const CANDLE_RULE_DEFAULTS: RuleSpecs = {
  open: { fn: 'first', column: 'open' },
  high: { fn: 'max', column: 'high' },
  low: { fn: 'min', column: 'low' },
  close: { fn: 'last', column: 'close' },
  volume: { fn: 'sum', column: 'volume' },
  tickVolume: { fn: 'sum', column: 'tickVolume' },
  spreadAvg: { fn: 'avg', column: 'spreadAvg' },
  spreadMax: { fn: 'max', column: 'spreadMax' },
  spreadMin: { fn: 'min', column: 'spreadMin' },
};

/**
 * Binds configured rules to column accessors. Price metrics are mandatory and
 * must read a column that is never null.
 */
export function resolveRules<R>(
  specs: RuleSpecs,
  columns: Readonly<Record<string, (row: R) => number | null>>,
  nullable: ReadonlySet<string> = new Set(),
): RollupRules<R> {
  const resolve = (metric: CandleMetric): ColumnRule<R> | undefined => {
    const spec = specs[metric];
    if (!spec) return undefined;
    if (spec.fn === 'count') return { fn: 'count', get: () => null };
    if (spec.column === undefined || !Object.hasOwn(columns, spec.column)) {
      throw new InvalidArgumentError(`rule for ${metric} needs a known source column, got "${spec.column ?? ''}"`);
    }
    return { fn: spec.fn, get: columns[spec.column] };
  };

  const price = PRICE_METRICS.map((metric) => {
    const rule = resolve(metric);
    const spec = specs[metric];
    if (!rule || !spec || rule.fn === 'count' || (spec.column !== undefined && nullable.has(spec.column))) {
      throw new InvalidArgumentError(`${metric} must aggregate a non-nullable column`);
    }
    return rule;
  });

  return {
    open: price[0],
    high: price[1],
    low: price[2],
    close: price[3],
    volume: resolve('volume'),
    tickVolume: resolve('tickVolume'),
    spreadAvg: resolve('spreadAvg'),
    spreadMax: resolve('spreadMax'),
    spreadMin: resolve('spreadMin'),
  };
}

/** Applies one rule to the rows of a bucket, which are ordered by time. */
export function applyRule<R>(rows: readonly R[], rule: ColumnRule<R>, precision: number): number | null {
  if (rule.fn === 'count') return rows.length;
  if (rule.fn === 'first') return rows.length ? rule.get(rows[0]) : null;
  if (rule.fn === 'last') return rows.length ? rule.get(rows[rows.length - 1]) : null;

  let n = 0;
  let acc = 0;
  for (const row of rows) {
    const v = rule.get(row);
    if (v === null) continue;
    if (n === 0) acc = v;
    else if (rule.fn === 'max') acc = Math.max(acc, v);
    else if (rule.fn === 'min') acc = Math.min(acc, v);
    else acc += v;
    n += 1;
  }
  if (n === 0) return null;
  if (rule.fn === 'avg') return roundTo(acc / n, precision);
  if (rule.fn === 'sum') return roundTo(acc, precision);
  return acc;
}

function required(value: number | null, metric: string): number {
  if (value === null) throw new Error(`rule for ${metric} produced no value`);
  return value;
}

export type RollupOptions<R> = {
  timeframe: Timeframe;
  widthMs: number;
  rules: RollupRules<R>;
  precision: number;
};

/**
 * Groups time-ordered rows into one candle per (symbol, bucket). Output is
 * ordered by bucket, then symbol.
 */
export function rollup<R extends TimeRow>(rows: readonly R[], opts: RollupOptions<R>): CandleRow[] {
  const groups = new Map<string, { symbol: string; bucket: number; rows: R[] }>();
  for (const row of rows) {
    const bucket = bucketStart(row.time, opts.widthMs);
    const k = `${row.symbol}|${bucket}`;
    const cur = groups.get(k);
    if (cur) cur.rows.push(row);
    else groups.set(k, { symbol: row.symbol, bucket, rows: [row] });
  }

  const { rules, precision } = opts;
  const optional = (rule: ColumnRule<R> | undefined, group: readonly R[]) =>
    rule ? applyRule(group, rule, precision) : null;

  const out: CandleRow[] = [];
  for (const g of groups.values()) {
    out.push({
      time: g.bucket,
      symbol: g.symbol,
      timeframe: opts.timeframe,
      open: required(applyRule(g.rows, rules.open, precision), 'open'),
      high: required(applyRule(g.rows, rules.high, precision), 'high'),
      low: required(applyRule(g.rows, rules.low, precision), 'low'),
      close: required(applyRule(g.rows, rules.close, precision), 'close'),
      volume: optional(rules.volume, g.rows) ?? 0,
      tickVolume: optional(rules.tickVolume, g.rows) ?? 0,
      spreadAvg: optional(rules.spreadAvg, g.rows),
      spreadMax: optional(rules.spreadMax, g.rows),
      spreadMin: optional(rules.spreadMin, g.rows),
    });
  }
  return out.sort((a, b) => a.time - b.time || a.symbol.localeCompare(b.symbol));
}
