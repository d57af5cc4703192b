import type { CandleRow, TickRow, Timeframe } from '../types/domain.js';
import { isTimeframe } from '../types/domain.js';
import type { TableSchema } from './columnar.js';

export const TICK_TABLE = 'market_ticks';

export function candleTableName(timeframe: Timeframe): string {
  return `ohlcv_${timeframe}`;
}

function text(map: ReadonlyMap<string, string>, name: string): string {
  const v = map.get(name);
  if (v === undefined) throw new Error(`missing text column ${name}`);
  return v;
}

function num(map: ReadonlyMap<string, number | null>, name: string): number {
  const v = map.get(name);
  if (v === undefined || v === null) throw new Error(`missing numeric column ${name}`);
  return v;
}

function nullable(map: ReadonlyMap<string, number | null>, name: string): number | null {
  return map.get(name) ?? null;
}

export const TICK_SCHEMA: TableSchema<TickRow> = {
  name: TICK_TABLE,
  textColumns: {
    symbol: (r) => r.symbol,
  },
  numericColumns: {
    bid: (r) => r.bid,
    ask: (r) => r.ask,
    bidSize: (r) => r.bidSize,
    askSize: (r) => r.askSize,
    spread: (r) => r.spread,
    mid: (r) => r.mid,
  },
  rebuild: (time, t, n) => ({
    time,
    symbol: text(t, 'symbol'),
    bid: num(n, 'bid'),
    ask: num(n, 'ask'),
    bidSize: num(n, 'bidSize'),
    askSize: num(n, 'askSize'),
    spread: num(n, 'spread'),
    mid: num(n, 'mid'),
  }),
};

export function candleSchema(timeframe: Timeframe): TableSchema<CandleRow> {
  return {
    name: candleTableName(timeframe),
    textColumns: {
      symbol: (r) => r.symbol,
      timeframe: (r) => r.timeframe,
    },
    numericColumns: {
      open: (r) => r.open,
      high: (r) => r.high,
      low: (r) => r.low,
      close: (r) => r.close,
      volume: (r) => r.volume,
      tickVolume: (r) => r.tickVolume,
      spreadAvg: (r) => r.spreadAvg,
      spreadMax: (r) => r.spreadMax,
      spreadMin: (r) => r.spreadMin,
    },
    rebuild: (time, t, n) => {
      const tf = text(t, 'timeframe');
      if (!isTimeframe(tf)) throw new Error(`unknown timeframe ${tf}`);
      return {
        time,
        symbol: text(t, 'symbol'),
        timeframe: tf,
        open: num(n, 'open'),
        high: num(n, 'high'),
        low: num(n, 'low'),
        close: num(n, 'close'),
        volume: num(n, 'volume'),
        tickVolume: num(n, 'tickVolume'),
        spreadAvg: nullable(n, 'spreadAvg'),
        spreadMax: nullable(n, 'spreadMax'),
        spreadMin: nullable(n, 'spreadMin'),
      };
    },
    uniqueKey: (r) => `${r.symbol}|${r.timeframe}|${r.time}`,
  };
}
