import { cfg } from './config/index.js';
import type { Policies } from './config/policies.js';
import { LifecycleScheduler, type PassReport } from './scheduler/scheduler.js';
import {
  ContinuousAggregator,
  type AggregateSpec,
  type AggregateStatus,
  type CandleSink,
  type RefreshResult,
} from './services/continuous-aggregate.js';
import { IndicatorEngine, type WindowQuery } from './services/indicators.service.js';
import { ingestItems, type IngestResult } from './services/ingest.service.js';
import type { CompressionPolicy, RetentionPolicy } from './services/lifecycle.service.js';
import { MarketStore, type MarketStoreOptions } from './store/market-store.js';
import { TICK_TABLE, candleTableName } from './store/schemas.js';
import type {
  AppendOutcome,
  CandleInput,
  CandleRow,
  ChunkInfo,
  SeriesPoint,
  TickInput,
  TickRow,
  Timeframe,
} from './types/domain.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

export type EngineOptions = {
  store: Omit<MarketStoreOptions, 'logger'>;
  scheduler: { tickMs: number; lifecycleIntervalMs: number };
  sinks?: readonly CandleSink[];
  clock?: () => number;
  logger?: Logger;
};

/**
 * The chunk store, the continuous aggregator, the lifecycle scheduler and
 * the indicator engine wired over one namespace.
 */
export class TimeseriesEngine {
  readonly store: MarketStore;
  readonly aggregator: ContinuousAggregator;
  readonly scheduler: LifecycleScheduler;
  readonly indicators: IndicatorEngine;
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(opts: EngineOptions) {
    this.clock = opts.clock ?? Date.now;
    this.log = opts.logger ?? rootLogger;
    this.store = new MarketStore({ ...opts.store, logger: this.log });
    this.aggregator = new ContinuousAggregator(this.store, { sinks: opts.sinks, logger: this.log });
    this.scheduler = new LifecycleScheduler(this.store, this.aggregator, {
      ...opts.scheduler,
      clock: this.clock,
      logger: this.log,
    });
    this.indicators = new IndicatorEngine(this.store, { clock: this.clock });
  }

  appendTick(input: TickInput): TickRow {
    return this.store.appendTick(input);
  }

  appendCandle(input: CandleInput): { row: CandleRow; outcome: AppendOutcome } {
    return this.store.appendCandle(input);
  }

  ingest(items: readonly unknown[]): IngestResult {
    return ingestItems(this.store, items, this.log);
  }

  readRange(symbol: string, timeframe: Timeframe, start: number, end = Number.POSITIVE_INFINITY): CandleRow[] {
    return this.store.readRange(symbol, timeframe, start, end);
  }

  readTicks(symbol: string, start: number, end = Number.POSITIVE_INFINITY): TickRow[] {
    return this.store.readTicks(symbol, start, end);
  }

  latest(symbol: string, timeframe: Timeframe, limit?: number): CandleRow[] {
    return this.indicators.latest(symbol, timeframe, limit);
  }

  atr(symbol: string, timeframe: Timeframe, q?: WindowQuery): SeriesPoint[] {
    return this.indicators.atr(symbol, timeframe, q);
  }

  sma(symbol: string, timeframe: Timeframe, q: WindowQuery & { period: number }): SeriesPoint[] {
    return this.indicators.sma(symbol, timeframe, q);
  }

  ema(symbol: string, timeframe: Timeframe, q: WindowQuery & { period: number }): SeriesPoint[] {
    return this.indicators.ema(symbol, timeframe, q);
  }

  defineAggregate(spec: AggregateSpec): AggregateStatus {
    this.scheduler.checkAggregate(
      {
        destination: candleTableName(spec.timeframe),
        source: spec.source === 'ticks' ? TICK_TABLE : candleTableName(spec.source),
      },
      spec.startOffsetMs,
    );
    return this.aggregator.define(spec).status();
  }

  async refresh(name: string): Promise<RefreshResult> {
    return this.aggregator.get(name).refresh(this.clock());
  }

  async reprocess(name: string, start: number, end: number): Promise<RefreshResult> {
    return this.aggregator.get(name).reprocess(start, end, { now: this.clock() });
  }

  setCompressionPolicy(policy: CompressionPolicy): CompressionPolicy {
    return this.scheduler.setCompressionPolicy(policy);
  }

  setRetentionPolicy(policy: RetentionPolicy): RetentionPolicy {
    return this.scheduler.setRetentionPolicy(policy);
  }

  /** Aggregates first, so compression policies are checked against their refresh windows. */
  applyPolicies(policies: Policies): void {
    for (const spec of policies.aggregates) this.defineAggregate(spec);
    for (const policy of policies.compression) this.setCompressionPolicy(policy);
    for (const policy of policies.retention) this.setRetentionPolicy(policy);
  }

  async runLifecycle(now = this.clock()): Promise<PassReport> {
    return this.scheduler.runPass(now);
  }

  aggregates(): AggregateStatus[] {
    return this.aggregator.list().map((a) => a.status());
  }

  chunks(table?: string): ChunkInfo[] {
    const tables = table ? [this.store.table(table)] : this.store.tables();
    return tables.flatMap((t) => t.listChunks());
  }

  start(): void {
    this.scheduler.start();
  }

  async stop(): Promise<void> {
    await this.scheduler.stop();
  }
}

export function createEngine(opts: Partial<EngineOptions> = {}): TimeseriesEngine {
  return new TimeseriesEngine({
    store: opts.store ?? cfg.store,
    scheduler: opts.scheduler ?? cfg.scheduler,
    sinks: opts.sinks,
    clock: opts.clock,
    logger: opts.logger,
  });
}

export type { PassReport } from './scheduler/scheduler.js';
export type { AggregateSpec, AggregateStatus, CandleSink, RefreshResult } from './services/continuous-aggregate.js';
export type { CompressionPolicy, RetentionPolicy } from './services/lifecycle.service.js';
export type { IngestResult } from './services/ingest.service.js';
export * from './errors.js';
export * from './types/domain.js';
