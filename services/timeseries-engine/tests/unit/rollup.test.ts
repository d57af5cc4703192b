import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../../src/errors.js';
import {
  CANDLE_RULE_DEFAULTS,
  TICK_RULE_DEFAULTS,
  bucketStart,
  resolveRules,
  rollup,
} from '../../src/services/rollup.service.js';
import { TICK_SCHEMA, candleSchema } from '../../src/store/schemas.js';
import { MIN, T0, appendEurusdMinute, newStore } from './helpers.js';

const tickRules = resolveRules(TICK_RULE_DEFAULTS, TICK_SCHEMA.numericColumns);
const candleRules = resolveRules(CANDLE_RULE_DEFAULTS, candleSchema('1m').numericColumns, new Set(['spreadAvg', 'spreadMax', 'spreadMin']));

describe('bucketStart', () => {
  it('floors to the bucket width', () => {
    expect(bucketStart(125_000, MIN)).toBe(120_000);
    expect(bucketStart(120_000, MIN)).toBe(120_000);
    expect(bucketStart(-1, MIN)).toBe(-60_000);
  });
});

describe('rollup', () => {
  it('builds a 1m candle from ticks', () => {
    const store = newStore();
    appendEurusdMinute(store);

    const out = rollup(store.readTicks(undefined, T0, T0 + MIN), { timeframe: '1m', widthMs: MIN, rules: tickRules, precision: 6 });

    expect(out).toEqual([
      {
        time: T0, symbol: 'EURUSD', timeframe: '1m',
        open: 1.1001, high: 1.1002, low: 1.1, close: 1.1,
        volume: 0, tickVolume: 3,
        spreadAvg: 0.0002, spreadMax: 0.0002, spreadMin: 0.0002,
      },
    ]);
  });

  it('builds a 5m candle from 1m candles', () => {
    const store = newStore();
    const bars = [
      [1, 2, 0.5, 2, 10, 1],
      [2, 6, 1, 3, 20, 2],
      [3, 4, 2, 4, 30, 3],
      [4, 5, 3, 5, 40, 4],
      [5, 6, 4, 5.5, 50, 5],
    ];
    bars.forEach(([open, high, low, close, volume, tickVolume], i) =>
      store.appendCandle({ symbol: 'EURUSD', timeframe: '1m', time: T0 + i * MIN, open, high, low, close, volume, tickVolume }),
    );

    const out = rollup(store.readRange('EURUSD', '1m', T0, T0 + 5 * MIN), {
      timeframe: '5m', widthMs: 5 * MIN, rules: candleRules, precision: 6,
    });

    expect(out).toEqual([
      {
        time: T0, symbol: 'EURUSD', timeframe: '5m',
        open: 1, high: 6, low: 0.5, close: 5.5,
        volume: 150, tickVolume: 15,
        spreadAvg: null, spreadMax: null, spreadMin: null,
      },
    ]);
  });

  it('orders output by bucket, then symbol', () => {
    const store = newStore();
    store.appendTick({ symbol: 'GBPUSD', time: T0 + 5_000, bid: 1.27, ask: 1.2702 });
    store.appendTick({ symbol: 'EURUSD', time: T0 + MIN + 5_000, bid: 1.1, ask: 1.1002 });
    store.appendTick({ symbol: 'EURUSD', time: T0 + 6_000, bid: 1.1, ask: 1.1002 });

    const out = rollup(store.readTicks(undefined, T0, T0 + 2 * MIN), { timeframe: '1m', widthMs: MIN, rules: tickRules, precision: 6 });

    expect(out.map((c) => [c.time, c.symbol])).toEqual([
      [T0, 'EURUSD'],
      [T0, 'GBPUSD'],
      [T0 + MIN, 'EURUSD'],
    ]);
  });
});

describe('resolveRules', () => {
  const columns = candleSchema('1m').numericColumns;
  const nullable = new Set(['spreadAvg', 'spreadMax', 'spreadMin']);

  it('refuses price metrics over nullable columns', () => {
    expect(() => resolveRules({ ...CANDLE_RULE_DEFAULTS, open: { fn: 'first', column: 'spreadAvg' } }, columns, nullable))
      .toThrow(InvalidArgumentError);
  });

  it('refuses count for a price metric', () => {
    expect(() => resolveRules({ ...CANDLE_RULE_DEFAULTS, close: { fn: 'count' } }, columns, nullable))
      .toThrow(InvalidArgumentError);
  });

  it('refuses unknown source columns', () => {
    expect(() => resolveRules({ ...CANDLE_RULE_DEFAULTS, volume: { fn: 'sum', column: 'notional' } }, columns, nullable))
      .toThrow(InvalidArgumentError);
  });
});
