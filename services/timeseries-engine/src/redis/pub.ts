import type { CandleSink } from '../services/continuous-aggregate.js';
import type { CandleRow, Timeframe } from '../types/domain.js';

export type Publisher = { publish(channel: string, message: string): Promise<number> };

export type CandleMessage = {
  kind: 'candle';
  aggregate: string;
  symbol: string;
  timeframe: Timeframe;
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tickVolume: number;
};

/** Publishes only the newest refreshed candle per symbol. */
export class RedisCandlePublisher implements CandleSink {
  readonly name = 'redis';

  constructor(private readonly pub: Publisher, private readonly channel: string) {}

  async write(rows: readonly CandleRow[], ctx: { aggregate: string }): Promise<void> {
    if (!rows.length) return;

    // keep only the latest per symbol
    const latest = new Map<string, CandleRow>();
    for (const r of rows) {
      const cur = latest.get(r.symbol);
      if (!cur || r.time >= cur.time) latest.set(r.symbol, r);
    }

    for (const r of latest.values()) {
      const msg: CandleMessage = {
        kind: 'candle',
        aggregate: ctx.aggregate,
        symbol: r.symbol,
        timeframe: r.timeframe,
        time: r.time,
        open: r.open,
        high: r.high,
        low: r.low,
        close: r.close,
        volume: r.volume,
        tickVolume: r.tickVolume,
      };
      await this.pub.publish(this.channel, JSON.stringify(msg));
    }
  }
}
