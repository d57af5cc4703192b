import { InvalidArgumentError, RefreshSkippedError } from '../errors.js';
import { aggregateRefreshDuration, aggregateRefreshes } from '../metrics/metrics.js';
import { assertRange } from '../store/hypertable.js';
import type { MarketStore } from '../store/market-store.js';
import { TICK_SCHEMA, TICK_TABLE, candleSchema, candleTableName } from '../store/schemas.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  TIMEFRAME_MS,
  type CandleRow,
  type TickRow,
  type TimeRange,
  type Timeframe,
} from '../types/domain.js';
import {
  CANDLE_RULE_DEFAULTS,
  TICK_RULE_DEFAULTS,
  bucketStart,
  resolveRules,
  rollup,
  type RollupRules,
  type RuleSpecs,
} from './rollup.service.js';

/** Aggregate configuration after parsing, durations in milliseconds. */
export type AggregateSpec = {
  name: string;
  source: 'ticks' | Timeframe;
  timeframe: Timeframe;
  columns?: RuleSpecs;
  startOffsetMs: number;
  endOffsetMs: number;
  refreshIntervalMs: number;
};

export type AggregateSource =
  | { kind: 'ticks'; rules: RollupRules<TickRow> }
  | { kind: 'candles'; timeframe: Timeframe; rules: RollupRules<CandleRow> };

export type AggregateDefinition = {
  name: string;
  timeframe: Timeframe;
  bucketWidthMs: number;
  source: AggregateSource;
  refresh: { startOffsetMs: number; endOffsetMs: number; intervalMs: number };
};

/** Receives every batch of refreshed candles after it is in the store. */
export interface CandleSink {
  readonly name: string;
  write(rows: readonly CandleRow[], ctx: { aggregate: string; timeframe: Timeframe }): Promise<void>;
}

export type RefreshResult = {
  aggregate: string;
  window: TimeRange;
  buckets: number;
  inserted: number;
  replaced: number;
  durationMs: number;
};

export type AggregateStatus = {
  name: string;
  source: string;
  timeframe: Timeframe;
  table: string;
  running: boolean;
  refreshIntervalMs: number;
  stalenessMs: number;
  lastRefreshAt: number | null;
  watermark: number | null;
};

type AggregateDeps = { sinks?: readonly CandleSink[]; logger?: Logger };

export class ContinuousAggregate {
  private running = false;
  private lastRun: { at: number; window: TimeRange } | null = null;
  private readonly log: Logger;

  constructor(
    readonly definition: AggregateDefinition,
    private readonly store: MarketStore,
    private readonly deps: AggregateDeps = {},
  ) {
    this.log = (deps.logger ?? rootLogger).child({ aggregate: definition.name });
  }

  get name() {
    return this.definition.name;
  }

  get table() {
    return candleTableName(this.definition.timeframe);
  }

  /** Table the aggregate reads from. */
  get sourceTable() {
    const { source } = this.definition;
    return source.kind === 'ticks' ? TICK_TABLE : candleTableName(source.timeframe);
  }

  get isRunning() {
    return this.running;
  }

  /** Closed buckets in `[now - start_offset, now - end_offset)`, aligned down to bucket starts. */
  refreshWindow(now: number): TimeRange {
    const { bucketWidthMs: w, refresh } = this.definition;
    return {
      start: bucketStart(now - refresh.startOffsetMs, w),
      end: bucketStart(now - refresh.endOffsetMs, w),
    };
  }

  /** Recomputes every bucket of the window from the source rows as they are now. */
  compute(window: TimeRange): CandleRow[] {
    const { source, timeframe, bucketWidthMs: widthMs } = this.definition;
    const precision = this.store.pricePrecision;
    if (window.end <= window.start) return [];
    if (source.kind === 'ticks') {
      const rows = this.store.readTicks(undefined, window.start, window.end);
      return rollup(rows, { timeframe, widthMs, rules: source.rules, precision });
    }
    const rows = this.store.candles(source.timeframe).readRange(window);
    return rollup(rows, { timeframe, widthMs, rules: source.rules, precision });
  }

  async refresh(now = Date.now(), opts: { signal?: AbortSignal } = {}): Promise<RefreshResult> {
    return this.exclusive(() => this.run(this.refreshWindow(now), now, opts.signal));
  }

  /**
   * Recomputes an explicit window, widened to whole buckets. Used to fold
   * late-arriving source rows into buckets the regular refresh has passed.
   */
  async reprocess(start: number, end: number, opts: { signal?: AbortSignal; now?: number } = {}): Promise<RefreshResult> {
    assertRange({ start, end });
    if (!Number.isFinite(end)) throw new InvalidArgumentError('reprocess needs a finite end');
    const w = this.definition.bucketWidthMs;
    const window = { start: bucketStart(start, w), end: Math.ceil(end / w) * w };
    return this.exclusive(() => this.run(window, opts.now ?? Date.now(), opts.signal));
  }

  status(): AggregateStatus {
    const { definition: d } = this;
    return {
      name: d.name,
      source: d.source.kind === 'ticks' ? 'ticks' : candleTableName(d.source.timeframe),
      timeframe: d.timeframe,
      table: this.table,
      running: this.running,
      refreshIntervalMs: d.refresh.intervalMs,
      stalenessMs: d.refresh.endOffsetMs,
      lastRefreshAt: this.lastRun?.at ?? null,
      watermark: this.lastRun?.window.end ?? null,
    };
  }

  private async exclusive<T>(job: () => Promise<T>): Promise<T> {
    if (this.running) {
      aggregateRefreshes.inc({ aggregate: this.name, status: 'skipped' });
      throw new RefreshSkippedError(this.name);
    }
    this.running = true;
    try {
      const out = await job();
      aggregateRefreshes.inc({ aggregate: this.name, status: 'ok' });
      return out;
    } catch (err) {
      if (!(err instanceof RefreshSkippedError)) aggregateRefreshes.inc({ aggregate: this.name, status: 'error' });
      throw err;
    } finally {
      this.running = false;
    }
  }

  private async run(window: TimeRange, now: number, signal?: AbortSignal): Promise<RefreshResult> {
    const started = Date.now();
    signal?.throwIfAborted();

    const rows = this.compute(window);
    const dest = this.store.candles(this.definition.timeframe);
    for (const row of rows) dest.assertWritable(row.time);
    signal?.throwIfAborted();

    // all-or-nothing: every destination chunk was checked above
    let inserted = 0;
    let replaced = 0;
    for (const row of rows) {
      if (this.store.upsertCandle(row) === 'inserted') inserted += 1;
      else replaced += 1;
    }
    this.lastRun = { at: now, window };

    // rows are stored; an abort only stops the remaining mirror writes
    for (const sink of this.deps.sinks ?? []) {
      signal?.throwIfAborted();
      await sink.write(rows, { aggregate: this.name, timeframe: this.definition.timeframe });
    }

    const durationMs = Date.now() - started;
    aggregateRefreshDuration.observe({ aggregate: this.name }, durationMs);
    this.log.debug({ window, buckets: rows.length, inserted, replaced, durationMs }, 'aggregate refreshed');
    return { aggregate: this.name, window, buckets: rows.length, inserted, replaced, durationMs };
  }
}

const NULLABLE_CANDLE_COLUMNS: ReadonlySet<string> = new Set(['spreadAvg', 'spreadMax', 'spreadMin']);

/**
 * Registry of continuous aggregates over one store. `list()` returns them in
 * refresh order: an aggregate always follows the one producing its source.
 */
export class ContinuousAggregator {
  private readonly aggregates = new Map<string, ContinuousAggregate>();

  constructor(private readonly store: MarketStore, private readonly deps: AggregateDeps = {}) {}

  define(spec: AggregateSpec): ContinuousAggregate {
    const definition = this.buildDefinition(spec);
    const aggregate = new ContinuousAggregate(definition, this.store, this.deps);
    this.aggregates.set(spec.name, aggregate);
    (this.deps.logger ?? rootLogger).info(
      { aggregate: spec.name, source: spec.source, timeframe: spec.timeframe },
      'continuous aggregate defined',
    );
    return aggregate;
  }

  get(name: string): ContinuousAggregate {
    const found = this.aggregates.get(name);
    if (!found) throw new InvalidArgumentError(`unknown aggregate ${name}`);
    return found;
  }

  list(): ContinuousAggregate[] {
    const depth = (a: ContinuousAggregate): number => {
      const src = a.definition.source;
      if (src.kind === 'ticks') return 0;
      const producer = this.producerOf(src.timeframe);
      return producer ? depth(producer) + 1 : 0;
    };
    return [...this.aggregates.values()].sort(
      (a, b) => depth(a) - depth(b) || a.definition.bucketWidthMs - b.definition.bucketWidthMs,
    );
  }

  /** Aggregates whose destination is the given table. */
  writersOf(table: string): ContinuousAggregate[] {
    return this.list().filter((a) => a.table === table || `${this.store.namespace}.${a.table}` === table);
  }

  /** Aggregates reading from the given table. */
  readersOf(table: string): ContinuousAggregate[] {
    return this.list().filter((a) => a.sourceTable === table || `${this.store.namespace}.${a.sourceTable}` === table);
  }

  private producerOf(timeframe: Timeframe): ContinuousAggregate | undefined {
    for (const a of this.aggregates.values()) {
      if (a.definition.timeframe === timeframe) return a;
    }
    return undefined;
  }

  private buildDefinition(spec: AggregateSpec): AggregateDefinition {
    if (this.aggregates.has(spec.name)) throw new InvalidArgumentError(`aggregate ${spec.name} already defined`);
    const clash = this.producerOf(spec.timeframe);
    if (clash) throw new InvalidArgumentError(`${candleTableName(spec.timeframe)} is already maintained by ${clash.name}`);

    const width = TIMEFRAME_MS[spec.timeframe];
    if (spec.endOffsetMs < 0) throw new InvalidArgumentError('end_offset must not be negative');
    if (spec.startOffsetMs - spec.endOffsetMs < width) {
      throw new InvalidArgumentError('refresh window (start_offset - end_offset) must cover at least one bucket');
    }
    if (!(spec.refreshIntervalMs > 0)) throw new InvalidArgumentError('refresh_interval must be positive');

    const refresh = {
      startOffsetMs: spec.startOffsetMs,
      endOffsetMs: spec.endOffsetMs,
      intervalMs: spec.refreshIntervalMs,
    };

    if (spec.source === 'ticks') {
      const rules = resolveRules({ ...TICK_RULE_DEFAULTS, ...spec.columns }, TICK_SCHEMA.numericColumns);
      return { name: spec.name, timeframe: spec.timeframe, bucketWidthMs: width, source: { kind: 'ticks', rules }, refresh };
    }

    const srcWidth = TIMEFRAME_MS[spec.source];
    if (srcWidth >= width || width % srcWidth !== 0) {
      throw new InvalidArgumentError(`${spec.source} candles cannot roll up into ${spec.timeframe}`);
    }
    const rules = resolveRules(
      { ...CANDLE_RULE_DEFAULTS, ...spec.columns },
      candleSchema(spec.source).numericColumns,
      NULLABLE_CANDLE_COLUMNS,
    );
    return {
      name: spec.name,
      timeframe: spec.timeframe,
      bucketWidthMs: width,
      source: { kind: 'candles', timeframe: spec.source, rules },
      refresh,
    };
  }
}
