import { MarketStore } from '../../src/store/market-store.js';

export const MIN = 60_000;
export const HOUR = 3_600_000;
export const DAY = 86_400_000;

// 2024-01-02 10:00 UTC, aligned to every timeframe up to 1h
export const T0 = Date.UTC(2024, 0, 2, 10, 0);

export function newStore(conflictPolicy: 'ignore' | 'error' = 'ignore') {
  return new MarketStore({
    namespace: 'test',
    pricePrecision: 6,
    tickChunkIntervalMs: DAY,
    candleChunkIntervalMs: 7 * DAY,
    conflictPolicy,
  });
}

/** EURUSD quotes at :00.100, :30 and :59 of one minute: mids 1.1001, 1.1002, 1.1000. */
export function appendEurusdMinute(store: MarketStore, start = T0) {
  store.appendTick({ symbol: 'EURUSD', time: start + 100, bid: 1.1000, ask: 1.1002 });
  store.appendTick({ symbol: 'EURUSD', time: start + 30_000, bid: 1.1001, ask: 1.1003 });
  store.appendTick({ symbol: 'EURUSD', time: start + 59_000, bid: 1.0999, ask: 1.1001 });
}
