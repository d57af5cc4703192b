import { describe, it, expect, vi } from 'vitest';
import { RedisCandlePublisher } from '../../src/redis/pub.js';
import type { CandleRow } from '../../src/types/domain.js';
import { MIN, T0 } from './helpers.js';

function candle(symbol: string, time: number, close: number): CandleRow {
  return {
    time, symbol, timeframe: '5m',
    open: 1, high: 2, low: 0.5, close,
    volume: 0, tickVolume: 7,
    spreadAvg: null, spreadMax: null, spreadMin: null,
  };
}

describe('RedisCandlePublisher', () => {
  it('publishes the newest candle of each symbol', async () => {
    const publish = vi.fn(async (_channel: string, _message: string) => 1);
    const sink = new RedisCandlePublisher({ publish }, 'ch:candles');

    await sink.write(
      [candle('EURUSD', T0 + 5 * MIN, 1.2), candle('EURUSD', T0, 1.1), candle('GBPUSD', T0, 1.3)],
      { aggregate: 'ohlcv_5m' },
    );

    expect(publish).toHaveBeenCalledTimes(2);
    expect(publish.mock.calls.map(([channel]) => channel)).toEqual(['ch:candles', 'ch:candles']);
    expect(JSON.parse(publish.mock.calls[0][1])).toEqual({
      kind: 'candle', aggregate: 'ohlcv_5m', symbol: 'EURUSD', timeframe: '5m',
      time: T0 + 5 * MIN, open: 1, high: 2, low: 0.5, close: 1.2, volume: 0, tickVolume: 7,
    });
    expect(JSON.parse(publish.mock.calls[1][1])).toMatchObject({ symbol: 'GBPUSD', close: 1.3 });
  });

  it('publishes nothing for an empty batch', async () => {
    const publish = vi.fn(async () => 1);
    await new RedisCandlePublisher({ publish }, 'ch:candles').write([], { aggregate: 'ohlcv_5m' });
    expect(publish).not.toHaveBeenCalled();
  });
});
