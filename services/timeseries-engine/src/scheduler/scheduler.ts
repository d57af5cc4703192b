import { InvalidArgumentError, RefreshSkippedError } from '../errors.js';
import type { ContinuousAggregate, ContinuousAggregator, RefreshResult } from '../services/continuous-aggregate.js';
import {
  compressChunks,
  retainChunks,
  type CompressResult,
  type CompressionPolicy,
  type RetainResult,
  type RetentionPolicy,
} from '../services/lifecycle.service.js';
import type { MarketStore } from '../store/market-store.js';
import { formatDuration } from '../utils/duration.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type SchedulerOptions = {
  tickMs: number;
  lifecycleIntervalMs: number;
  clock?: () => number;
  logger?: Logger;
};

export type PassReport = {
  startedAt: number;
  refreshed: RefreshResult[];
  skipped: string[];
  failed: Array<{ job: string; error: string }>;
  compressed: CompressResult[];
  retained: RetainResult[];
  aborted: boolean;
};

function emptyReport(now: number): PassReport {
  return { startedAt: now, refreshed: [], skipped: [], failed: [], compressed: [], retained: [], aborted: false };
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns the compression/retention policies and drives every background job:
 * aggregate refreshes first (finer before coarser), then compression, then
 * retention.
 */
export class LifecycleScheduler {
  private readonly compression = new Map<string, CompressionPolicy>();
  private readonly retention = new Map<string, RetentionPolicy>();
  private readonly nextRefreshAt = new Map<string, number>();
  private nextLifecycleAt = 0;
  private timer: NodeJS.Timeout | null = null;
  private controller = new AbortController();
  private readonly inflight = new Set<Promise<unknown>>();
  private readonly clock: () => number;
  private readonly log: Logger;

  constructor(
    private readonly store: MarketStore,
    private readonly aggregator: ContinuousAggregator,
    private readonly opts: SchedulerOptions,
  ) {
    this.clock = opts.clock ?? Date.now;
    this.log = (opts.logger ?? rootLogger).child({ component: 'scheduler' });
  }

  setCompressionPolicy(policy: CompressionPolicy): CompressionPolicy {
    const table = this.store.table(policy.table);
    table.validateLayout(policy.layout);

    const retention = this.retention.get(table.name);
    if (retention && policy.ageThresholdMs >= retention.ageThresholdMs) {
      throw new InvalidArgumentError(`${table.name}: compression age must be younger than retention age`);
    }
    for (const agg of this.aggregator.writersOf(table.name)) {
      this.assertCompressionClearsRefresh(table.name, policy.ageThresholdMs, agg.definition.refresh.startOffsetMs);
    }

    const stored = { ...policy, table: table.name };
    this.compression.set(table.name, stored);
    this.log.info(
      { table: table.qualifiedName, after: formatDuration(policy.ageThresholdMs), ...policy.layout },
      'compression policy set',
    );
    return stored;
  }

  setRetentionPolicy(policy: RetentionPolicy): RetentionPolicy {
    const table = this.store.table(policy.table);
    const compression = this.compression.get(table.name);
    if (compression && compression.ageThresholdMs >= policy.ageThresholdMs) {
      throw new InvalidArgumentError(`${table.name}: retention age must be older than compression age`);
    }
    for (const agg of [...this.aggregator.writersOf(table.name), ...this.aggregator.readersOf(table.name)]) {
      this.assertRetentionClearsRefresh(table.name, policy.ageThresholdMs, agg.definition.refresh.startOffsetMs);
    }

    const stored = { ...policy, table: table.name };
    this.retention.set(table.name, stored);
    this.log.info({ table: table.qualifiedName, after: formatDuration(policy.ageThresholdMs) }, 'retention policy set');
    return stored;
  }

  /**
   * Rejects an aggregate whose refresh window would reach into compressed
   * destination chunks, or into chunks retention drops on either side.
   */
  checkAggregate(tables: { destination: string; source: string }, startOffsetMs: number): void {
    const compression = this.compression.get(tables.destination);
    if (compression) this.assertCompressionClearsRefresh(tables.destination, compression.ageThresholdMs, startOffsetMs);
    for (const table of [tables.destination, tables.source]) {
      const retention = this.retention.get(table);
      if (retention) this.assertRetentionClearsRefresh(table, retention.ageThresholdMs, startOffsetMs);
    }
  }

  policies() {
    return { compression: [...this.compression.values()], retention: [...this.retention.values()] };
  }

  /** Runs every aggregate and every policy once, regardless of schedule. */
  async runPass(now = this.clock(), signal: AbortSignal = this.controller.signal): Promise<PassReport> {
    const report = emptyReport(now);
    await this.runRefreshes(this.aggregator.list(), now, signal, report);
    if (!report.aborted) this.runLifecycle(now, signal, report);
    return report;
  }

  /** Runs whatever is due at `now`. */
  async tick(now = this.clock()): Promise<PassReport> {
    const signal = this.controller.signal;
    const report = emptyReport(now);

    const due = this.aggregator.list().filter((a) => (this.nextRefreshAt.get(a.name) ?? 0) <= now);
    for (const a of due) this.nextRefreshAt.set(a.name, now + a.definition.refresh.intervalMs);
    await this.runRefreshes(due, now, signal, report);

    if (!report.aborted && now >= this.nextLifecycleAt) {
      this.nextLifecycleAt = now + this.opts.lifecycleIntervalMs;
      this.runLifecycle(now, signal, report);
    }
    return report;
  }

  start(): void {
    if (this.timer) return;
    this.controller = new AbortController();
    this.timer = setInterval(() => this.track(this.tick()), this.opts.tickMs);
    this.timer.unref();
    this.log.info({ tickMs: this.opts.tickMs, lifecycleIntervalMs: this.opts.lifecycleIntervalMs }, 'scheduler started');
  }

  /** Aborts in-flight jobs and waits for them to unwind. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();
    await Promise.allSettled([...this.inflight]);
    this.log.info('scheduler stopped');
  }

  private track(job: Promise<PassReport>) {
    const p = job
      .catch((err: unknown) => this.log.error({ err }, 'scheduler tick failed'))
      .finally(() => this.inflight.delete(p));
    this.inflight.add(p);
  }

  private async runRefreshes(
    aggregates: readonly ContinuousAggregate[],
    now: number,
    signal: AbortSignal,
    report: PassReport,
  ) {
    for (const agg of aggregates) {
      if (signal.aborted) {
        report.aborted = true;
        return;
      }
      try {
        report.refreshed.push(await agg.refresh(now, { signal }));
      } catch (err) {
        if (signal.aborted) {
          this.log.warn({ aggregate: agg.name }, 'refresh aborted');
          report.aborted = true;
          return;
        }
        if (err instanceof RefreshSkippedError) {
          this.log.warn({ aggregate: agg.name }, 'refresh skipped, previous run still in progress');
          report.skipped.push(agg.name);
          continue;
        }
        this.log.error({ err, aggregate: agg.name }, 'refresh failed');
        report.failed.push({ job: `refresh:${agg.name}`, error: message(err) });
      }
    }
  }

  private runLifecycle(now: number, signal: AbortSignal, report: PassReport) {
    for (const policy of this.compression.values()) {
      try {
        const table = this.store.table(policy.table);
        report.compressed.push(
          compressChunks(table, now - policy.ageThresholdMs, policy.layout, { signal, logger: this.log }),
        );
      } catch (err) {
        if (signal.aborted) {
          report.aborted = true;
          return;
        }
        this.log.error({ err, table: policy.table }, 'compression failed');
        report.failed.push({ job: `compress:${policy.table}`, error: message(err) });
      }
    }

    for (const policy of this.retention.values()) {
      try {
        const table = this.store.table(policy.table);
        const result = retainChunks(table, policy.ageThresholdMs, now, { signal, logger: this.log });
        report.retained.push(result);
        for (const f of result.failed) report.failed.push({ job: `retain:${policy.table}`, error: f.error });
      } catch (err) {
        if (signal.aborted) {
          report.aborted = true;
          return;
        }
        this.log.error({ err, table: policy.table }, 'retention failed');
        report.failed.push({ job: `retain:${policy.table}`, error: message(err) });
      }
    }
  }

  private assertRetentionClearsRefresh(table: string, retainForMs: number, startOffsetMs: number) {
    if (retainForMs <= startOffsetMs) {
      throw new InvalidArgumentError(
        `${table}: retention after ${formatDuration(retainForMs)} would drop buckets still refreshed ` +
          `(start_offset ${formatDuration(startOffsetMs)})`,
      );
    }
  }

  private assertCompressionClearsRefresh(table: string, compressAfterMs: number, startOffsetMs: number) {
    if (compressAfterMs <= startOffsetMs) {
      throw new InvalidArgumentError(
        `${table}: compression after ${formatDuration(compressAfterMs)} would freeze buckets still refreshed ` +
          `(start_offset ${formatDuration(startOffsetMs)})`,
      );
    }
  }
}
