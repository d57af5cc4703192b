import { createCandleSchema, upsertCandlesBatch } from '../db/sql.js';
import type { CandleSink } from '../services/continuous-aggregate.js';
import type { CandleRow } from '../types/domain.js';

/** The slice of `pg.Pool` the mirror needs. */
export type SqlClient = { query(text: string, values?: unknown[]): Promise<unknown> };

export async function ensureCandleTable(db: SqlClient, namespace: string): Promise<void> {
  await db.query(createCandleSchema(namespace));
}

export async function upsertCandles(db: SqlClient, namespace: string, rows: readonly CandleRow[]): Promise<void> {
  if (!rows.length) return;
  const sym   = rows.map(r => r.symbol);
  const tf    = rows.map(r => r.timeframe);
  const buck  = rows.map(r => r.time);
  const open  = rows.map(r => r.open);
  const high  = rows.map(r => r.high);
  const low   = rows.map(r => r.low);
  const close = rows.map(r => r.close);
  const vol   = rows.map(r => r.volume);
  const tvol  = rows.map(r => r.tickVolume);
  const sAvg  = rows.map(r => r.spreadAvg);
  const sMax  = rows.map(r => r.spreadMax);
  const sMin  = rows.map(r => r.spreadMin);
  await db.query(upsertCandlesBatch(namespace), [sym, tf, buck, open, high, low, close, vol, tvol, sAvg, sMax, sMin]);
}

/** Mirrors every refreshed batch into `<namespace>.ohlcv_candles`. */
export class PgCandleSink implements CandleSink {
  readonly name = 'postgres';

  constructor(private readonly db: SqlClient, private readonly namespace: string) {}

  async write(rows: readonly CandleRow[]): Promise<void> {
    await upsertCandles(this.db, this.namespace, rows);
  }
}
