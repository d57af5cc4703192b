export const TIMEFRAMES = ['1m', '5m', '15m', '30m', '1h', '4h', '1d'] as const;
export type Timeframe = (typeof TIMEFRAMES)[number];

export const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1m': 60_000,
  '5m': 300_000,
  '15m': 900_000,
  '30m': 1_800_000,
  '1h': 3_600_000,
  '4h': 14_400_000,
  '1d': 86_400_000,
};

export function isTimeframe(v: string): v is Timeframe {
  return TIMEFRAMES.some((tf) => tf === v);
}

/** Every stored row is partitioned on `time` (epoch ms) and filtered on `symbol`. */
export type TimeRow = { time: number; symbol: string };

export type TickInput = {
  symbol: string;
  time: number;
  bid: number;
  ask: number;
  bidSize?: number;
  askSize?: number;
};

export type TickRow = TimeRow & {
  bid: number;
  ask: number;
  bidSize: number;
  askSize: number;
  spread: number;   // ask - bid, fixed at write time
  mid: number;      // (bid + ask) / 2, fixed at write time
};

export type CandleInput = {
  symbol: string;
  timeframe: Timeframe;
  time: number;     // bucket start, aligned to the timeframe
  open: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
  tickVolume?: number;
};

export type CandleRow = TimeRow & {
  timeframe: Timeframe;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  tickVolume: number;
  spreadAvg: number | null;
  spreadMax: number | null;
  spreadMin: number | null;
};

export type SeriesPoint = { time: number; value: number };

export type TimeRange = { start: number; end: number };

export type ChunkState = 'OPEN' | 'COMPRESSED' | 'EXPIRED';

export type ChunkInfo = {
  id: string;
  table: string;
  rangeStart: number;
  rangeEnd: number;
  state: ChunkState;
  rowCount: number;
};

export type ConflictPolicy = 'ignore' | 'error';

export type AppendOutcome = 'inserted' | 'ignored';
export type UpsertOutcome = 'inserted' | 'replaced';
