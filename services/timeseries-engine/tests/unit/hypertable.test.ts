import { describe, it, expect } from 'vitest';
import { ChunkImmutableError, DuplicateKeyError, InvalidArgumentError } from '../../src/errors.js';
import { deltaDecode, deltaEncode } from '../../src/store/columnar.js';
import { Hypertable } from '../../src/store/hypertable.js';
import { TICK_SCHEMA, candleSchema } from '../../src/store/schemas.js';
import type { CandleRow, TickRow } from '../../src/types/domain.js';

const layout = { segmentBy: ['symbol'], orderBy: { column: 'time', direction: 'desc' as const } };

function tick(time: number, symbol = 'EURUSD', bid = 1.1): TickRow {
  return { time, symbol, bid, ask: bid + 0.0002, bidSize: 1, askSize: 1, spread: 0.0002, mid: bid + 0.0001 };
}

function candle(time: number, close: number): CandleRow {
  return {
    time, symbol: 'EURUSD', timeframe: '1m',
    open: 1, high: 2, low: 0.5, close, volume: 0, tickVolume: 1,
    spreadAvg: null, spreadMax: null, spreadMin: null,
  };
}

function ticks() {
  return new Hypertable(TICK_SCHEMA, { namespace: 'test', chunkIntervalMs: 1000 });
}

describe('delta encoding', () => {
  it('round-trips a time column', () => {
    const enc = deltaEncode([5, 7, 7, 10]);
    expect(Array.from(enc)).toEqual([5, 2, 0, 3]);
    expect(deltaDecode(enc)).toEqual([5, 7, 7, 10]);
  });
});

describe('Hypertable', () => {
  it('creates chunks aligned to the chunk interval', () => {
    const t = ticks();
    t.append(tick(2500));
    t.append(tick(500));
    t.append(tick(1500));

    expect(t.qualifiedName).toBe('test.market_ticks');
    expect(t.listChunks()).toEqual([
      { id: 'market_ticks_0', table: 'test.market_ticks', rangeStart: 0, rangeEnd: 1000, state: 'OPEN', rowCount: 1 },
      { id: 'market_ticks_1000', table: 'test.market_ticks', rangeStart: 1000, rangeEnd: 2000, state: 'OPEN', rowCount: 1 },
      { id: 'market_ticks_2000', table: 'test.market_ticks', rangeStart: 2000, rangeEnd: 3000, state: 'OPEN', rowCount: 1 },
    ]);
  });

  it('reads half-open ranges in time order', () => {
    const t = ticks();
    for (const time of [1000, 0, 500]) t.append(tick(time));
    expect(t.readRange({ start: 0, end: 1000 }).map((r) => r.time)).toEqual([0, 500]);
    expect(t.readRange({ start: 500, end: 500 })).toEqual([]);
  });

  it('keeps insertion order between equal timestamps', () => {
    const t = ticks();
    t.append(tick(100, 'EURUSD', 1.1));
    t.append(tick(100, 'EURUSD', 1.2));
    t.append(tick(50, 'EURUSD', 1.3));
    expect(t.readRange({ start: 0, end: 1000 }).map((r) => r.bid)).toEqual([1.3, 1.1, 1.2]);
  });

  it('filters by symbol and hands out frozen rows', () => {
    const t = ticks();
    t.append(tick(10, 'EURUSD'));
    t.append(tick(20, 'GBPUSD'));
    const rows = t.readRange({ start: 0, end: 100 }, 'GBPUSD');
    expect(rows.map((r) => r.symbol)).toEqual(['GBPUSD']);
    expect(Object.isFrozen(rows[0])).toBe(true);
  });

  it('rejects malformed ranges', () => {
    const t = ticks();
    expect(() => t.readRange({ start: 10, end: 5 })).toThrow(InvalidArgumentError);
    expect(() => t.readRange({ start: Number.NaN, end: 5 })).toThrow(InvalidArgumentError);
    expect(() => t.append(tick(Number.POSITIVE_INFINITY))).toThrow(InvalidArgumentError);
  });

  it('reads a compressed chunk exactly as before and refuses writes into it', () => {
    const t = ticks();
    t.append(tick(300, 'GBPUSD', 1.25));
    t.append(tick(100, 'EURUSD', 1.1));
    t.append(tick(100, 'EURUSD', 1.2));
    t.append(tick(700, 'EURUSD', 1.15));
    t.append(tick(1200, 'EURUSD', 1.3));
    const before = t.readRange({ start: 0, end: 2000 });

    const info = t.compressChunk('market_ticks_0', layout);

    expect(info.state).toBe('COMPRESSED');
    expect(info.rowCount).toBe(4);
    expect(t.readRange({ start: 0, end: 2000 })).toEqual(before);
    expect(t.readRange({ start: 0, end: 1000 }, 'EURUSD').map((r) => r.bid)).toEqual([1.1, 1.2, 1.15]);
    expect(() => t.append(tick(400))).toThrow(ChunkImmutableError);
    expect(t.append(tick(1400))).toBe('inserted');
  });

  it('orders segments by a numeric column without changing reads', () => {
    const t = ticks();
    t.append(tick(100, 'EURUSD', 1.3));
    t.append(tick(200, 'EURUSD', 1.1));
    const before = t.readRange({ start: 0, end: 1000 });
    t.compressChunk('market_ticks_0', { segmentBy: [], orderBy: { column: 'bid', direction: 'asc' } });
    expect(t.readRange({ start: 0, end: 1000 })).toEqual(before);
  });

  it('drops whole chunks and keeps them as tombstones', () => {
    const t = ticks();
    t.append(tick(100));
    t.append(tick(200));
    t.append(tick(1100));

    const before = t.dropChunk('market_ticks_0');

    expect(before.rowCount).toBe(2);
    expect(before.state).toBe('OPEN');
    expect(t.listChunks()[0]).toMatchObject({ id: 'market_ticks_0', state: 'EXPIRED', rowCount: 0 });
    expect(t.readRange({ start: 0, end: 2000 }).map((r) => r.time)).toEqual([1100]);
    expect(() => t.append(tick(300))).toThrow(ChunkImmutableError);
    expect(() => t.dropChunk('market_ticks_9000')).toThrow(InvalidArgumentError);
  });

  it('returns the newest rows first across chunks', () => {
    const t = ticks();
    for (const time of [100, 1100, 900, 2100]) t.append(tick(time));
    t.append(tick(1500, 'GBPUSD'));
    expect(t.latest('EURUSD', 3).map((r) => r.time)).toEqual([2100, 1100, 900]);
  });

  it('validates compression layouts against the schema', () => {
    const t = ticks();
    expect(() => t.validateLayout({ segmentBy: ['venue'], orderBy: { column: 'time', direction: 'asc' } }))
      .toThrow(InvalidArgumentError);
    expect(() => t.validateLayout({ segmentBy: ['symbol'], orderBy: { column: 'symbol', direction: 'asc' } }))
      .toThrow(InvalidArgumentError);
  });
});

describe('Hypertable unique keys', () => {
  it('keeps the first write under the ignore policy', () => {
    const t = new Hypertable(candleSchema('1m'), { namespace: 'test', chunkIntervalMs: 3_600_000 });
    expect(t.append(candle(60_000, 1.5))).toBe('inserted');
    expect(t.append(candle(60_000, 9.9))).toBe('ignored');
    expect(t.readRange({ start: 0, end: 120_000 }).map((r) => r.close)).toEqual([1.5]);
  });

  it('surfaces duplicates under the error policy', () => {
    const t = new Hypertable(candleSchema('1m'), { namespace: 'test', chunkIntervalMs: 3_600_000, conflictPolicy: 'error' });
    t.append(candle(60_000, 1.5));
    expect(() => t.append(candle(60_000, 9.9))).toThrow(DuplicateKeyError);
  });

  it('replaces on upsert', () => {
    const t = new Hypertable(candleSchema('1m'), { namespace: 'test', chunkIntervalMs: 3_600_000 });
    expect(t.upsert(candle(60_000, 1.5))).toBe('inserted');
    expect(t.upsert(candle(60_000, 1.7))).toBe('replaced');
    expect(t.readRange({ start: 0, end: 120_000 }).map((r) => r.close)).toEqual([1.7]);
    expect(t.listChunks()[0].rowCount).toBe(1);
  });

  it('refuses upserts on tables without a unique key', () => {
    expect(() => ticks().upsert(tick(1))).toThrow(InvalidArgumentError);
  });
});
