// `ns` is the configured namespace; it is validated as a plain identifier.

export const createCandleSchema = (ns: string) => `
  CREATE SCHEMA IF NOT EXISTS ${ns};
  CREATE TABLE IF NOT EXISTS ${ns}.ohlcv_candles (
    symbol        text             NOT NULL,
    timeframe     text             NOT NULL,
    bucket_start  timestamptz      NOT NULL,
    open          double precision NOT NULL,
    high          double precision NOT NULL,
    low           double precision NOT NULL,
    close         double precision NOT NULL,
    volume        double precision NOT NULL DEFAULT 0,
    tick_volume   integer          NOT NULL DEFAULT 0,
    spread_avg    double precision,
    spread_max    double precision,
    spread_min    double precision,
    updated_at    timestamptz      NOT NULL DEFAULT now(),
    PRIMARY KEY (symbol, timeframe, bucket_start)
  )
`;

/* Batch candle upsert — one row per (symbol, timeframe, bucket_start).
   Refreshed buckets are full recomputations, so the incoming row replaces
   the stored one. bucket_start arrives as epoch milliseconds.
*/
export const upsertCandlesBatch = (ns: string) => `
  WITH rows AS (
    SELECT
      unnest($1::text[])                          AS symbol,
      unnest($2::text[])                          AS timeframe,
      to_timestamp(unnest($3::bigint[]) / 1000.0) AS bucket_start,
      unnest($4::double precision[])              AS open,
      unnest($5::double precision[])              AS high,
      unnest($6::double precision[])              AS low,
      unnest($7::double precision[])              AS close,
      unnest($8::double precision[])              AS volume,
      unnest($9::integer[])                       AS tick_volume,
      unnest($10::double precision[])             AS spread_avg,
      unnest($11::double precision[])             AS spread_max,
      unnest($12::double precision[])             AS spread_min
  )
  INSERT INTO ${ns}.ohlcv_candles
    (symbol, timeframe, bucket_start, open, high, low, close, volume, tick_volume, spread_avg, spread_max, spread_min)
  SELECT symbol, timeframe, bucket_start, open, high, low, close, volume, tick_volume, spread_avg, spread_max, spread_min
  FROM rows
  ON CONFLICT (symbol, timeframe, bucket_start) DO UPDATE SET
    open        = EXCLUDED.open,
    high        = EXCLUDED.high,
    low         = EXCLUDED.low,
    close       = EXCLUDED.close,
    volume      = EXCLUDED.volume,
    tick_volume = EXCLUDED.tick_volume,
    spread_avg  = EXCLUDED.spread_avg,
    spread_max  = EXCLUDED.spread_max,
    spread_min  = EXCLUDED.spread_min,
    updated_at  = now()
`;
