import { InvalidArgumentError } from '../errors.js';
import type { MarketStore } from '../store/market-store.js';
import type { CandleRow, SeriesPoint, Timeframe } from '../types/domain.js';

const THIRTY_DAYS_MS = 30 * 86_400_000;

export const ATR_DEFAULT_PERIOD = 14;
export const LATEST_DEFAULT_LIMIT = 100;

export type WindowQuery = {
  period?: number;
  startTime?: number;
  endTime?: number;
};

function assertPeriod(period: number) {
  if (!Number.isInteger(period) || period <= 0) {
    throw new InvalidArgumentError(`period must be a positive integer, got ${period}`);
  }
}

/** True range per candle; the first one has no previous close and is just high - low. */
export function trueRanges(candles: readonly Pick<CandleRow, 'high' | 'low' | 'close'>[]): number[] {
  return candles.map((c, i) => {
    const range = c.high - c.low;
    if (i === 0) return range;
    const prevClose = candles[i - 1].close;
    return Math.max(range, Math.abs(c.high - prevClose), Math.abs(c.low - prevClose));
  });
}

/** Trailing mean over at most `period` values; the warm-up uses whatever is available. */
export function rollingMean(values: readonly number[], period: number): number[] {
  const out: number[] = [];
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    out.push(sum / Math.min(i + 1, period));
  }
  return out;
}

export function exponentialMean(values: readonly number[], period: number): number[] {
  const alpha = 2 / (period + 1);
  const out: number[] = [];
  for (let i = 0; i < values.length; i++) {
    out.push(i === 0 ? values[0] : alpha * values[i] + (1 - alpha) * out[i - 1]);
  }
  return out;
}

/**
 * Windowed indicators over the candle tables. Every call reads a bounded
 * range and returns a finite series; nothing is kept between calls.
 */
export class IndicatorEngine {
  private readonly clock: () => number;

  constructor(private readonly store: MarketStore, opts: { clock?: () => number } = {}) {
    this.clock = opts.clock ?? Date.now;
  }

  atr(symbol: string, timeframe: Timeframe, q: WindowQuery = {}): SeriesPoint[] {
    const period = q.period ?? ATR_DEFAULT_PERIOD;
    assertPeriod(period);
    const candles = this.window(symbol, timeframe, q);
    const atr = rollingMean(trueRanges(candles), period);
    return candles.map((c, i) => ({ time: c.time, value: atr[i] }));
  }

  /** Simple moving average of closes, emitted once a full window is available. */
  sma(symbol: string, timeframe: Timeframe, q: WindowQuery & { period: number }): SeriesPoint[] {
    assertPeriod(q.period);
    const candles = this.window(symbol, timeframe, q);
    const means = rollingMean(candles.map((c) => c.close), q.period);
    return candles.slice(q.period - 1).map((c, i) => ({ time: c.time, value: means[i + q.period - 1] }));
  }

  ema(symbol: string, timeframe: Timeframe, q: WindowQuery & { period: number }): SeriesPoint[] {
    assertPeriod(q.period);
    const candles = this.window(symbol, timeframe, q);
    const ema = exponentialMean(candles.map((c) => c.close), q.period);
    return candles.map((c, i) => ({ time: c.time, value: ema[i] }));
  }

  latest(symbol: string, timeframe: Timeframe, limit = LATEST_DEFAULT_LIMIT): CandleRow[] {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
    }
    return this.store.candles(timeframe).latest(symbol, limit);
  }

  private window(symbol: string, timeframe: Timeframe, q: WindowQuery): CandleRow[] {
    const start = q.startTime ?? this.clock() - THIRTY_DAYS_MS;
    const end = q.endTime ?? Number.POSITIVE_INFINITY;
    return this.store.readRange(symbol, timeframe, start, end);
  }
}
