import { InvalidArgumentError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  TIMEFRAMES,
  TIMEFRAME_MS,
  type AppendOutcome,
  type CandleInput,
  type CandleRow,
  type ConflictPolicy,
  type TickInput,
  type TickRow,
  type Timeframe,
  type UpsertOutcome,
} from '../types/domain.js';
import { Hypertable, type ManagedTable } from './hypertable.js';
import { TICK_SCHEMA, candleSchema } from './schemas.js';

export type MarketStoreOptions = {
  namespace: string;
  pricePrecision: number;
  tickChunkIntervalMs: number;
  candleChunkIntervalMs: number;
  conflictPolicy: ConflictPolicy;
  logger?: Logger;
};

export function roundTo(value: number, precision: number): number {
  return Number(value.toFixed(precision));
}

/**
 * The chunk store: one tick table plus one candle table per timeframe, all
 * under a single namespace.
 */
export class MarketStore {
  readonly namespace: string;
  readonly pricePrecision: number;
  readonly ticks: Hypertable<TickRow>;
  private readonly candleTables = new Map<Timeframe, Hypertable<CandleRow>>();

  constructor(opts: MarketStoreOptions) {
    const log = opts.logger ?? rootLogger;
    this.namespace = opts.namespace;
    this.pricePrecision = opts.pricePrecision;
    this.ticks = new Hypertable(TICK_SCHEMA, {
      namespace: opts.namespace,
      chunkIntervalMs: opts.tickChunkIntervalMs,
      logger: log,
    });
    for (const tf of TIMEFRAMES) {
      this.candleTables.set(
        tf,
        new Hypertable(candleSchema(tf), {
          namespace: opts.namespace,
          chunkIntervalMs: opts.candleChunkIntervalMs,
          conflictPolicy: opts.conflictPolicy,
          logger: log,
        }),
      );
    }
  }

  appendTick(input: TickInput): TickRow {
    const row: TickRow = {
      time: input.time,
      symbol: input.symbol,
      bid: input.bid,
      ask: input.ask,
      bidSize: input.bidSize ?? 0,
      askSize: input.askSize ?? 0,
      spread: roundTo(input.ask - input.bid, this.pricePrecision),
      mid: roundTo((input.bid + input.ask) / 2, this.pricePrecision),
    };
    this.ticks.append(row);
    return row;
  }

  appendCandle(input: CandleInput): { row: CandleRow; outcome: AppendOutcome } {
    if (input.time % TIMEFRAME_MS[input.timeframe] !== 0) {
      throw new InvalidArgumentError(`candle time ${input.time} is not aligned to ${input.timeframe}`);
    }
    const row: CandleRow = {
      time: input.time,
      symbol: input.symbol,
      timeframe: input.timeframe,
      open: input.open,
      high: input.high,
      low: input.low,
      close: input.close,
      volume: input.volume ?? 0,
      tickVolume: input.tickVolume ?? 0,
      spreadAvg: null,
      spreadMax: null,
      spreadMin: null,
    };
    return { row, outcome: this.candles(input.timeframe).append(row) };
  }

  upsertCandle(row: CandleRow): UpsertOutcome {
    return this.candles(row.timeframe).upsert(row);
  }

  readRange(symbol: string, timeframe: Timeframe, start: number, end: number): CandleRow[] {
    return this.candles(timeframe).readRange({ start, end }, symbol);
  }

  readTicks(symbol: string | undefined, start: number, end: number): TickRow[] {
    return this.ticks.readRange({ start, end }, symbol);
  }

  candles(timeframe: Timeframe): Hypertable<CandleRow> {
    const table = this.candleTables.get(timeframe);
    if (!table) throw new InvalidArgumentError(`unknown timeframe ${timeframe}`);
    return table;
  }

  tables(): ManagedTable[] {
    return [this.ticks, ...this.candleTables.values()];
  }

  table(name: string): ManagedTable {
    const found = this.tables().find((t) => t.name === name || t.qualifiedName === name);
    if (!found) throw new InvalidArgumentError(`unknown table ${name}`);
    return found;
  }
}
