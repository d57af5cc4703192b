import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { buildApp } from '../../src/app.js';
import { cfg } from '../../src/config/index.js';
import { TimeseriesEngine } from '../../src/engine.js';
import { DAY, HOUR, MIN, T0 } from './helpers.js';

const P = cfg.apiPrefix;
const KEY = 'test-secret';

const ONE_MINUTE = {
  name: 'ohlcv_1m',
  source: 'ticks',
  timeframe: '1m',
  start_offset: '1 hour',
  end_offset: '1 minute',
  refresh_interval: '1 minute',
};

function candle(time: number, close: number) {
  return { kind: 'candle', symbol: 'EURUSD', timeframe: '1m', time, open: 1.1, high: 1.2, low: 1.0, close };
}

describe('HTTP API', () => {
  let engine: TimeseriesEngine;
  let app: ReturnType<typeof buildApp>;

  beforeEach(() => {
    engine = new TimeseriesEngine({
      store: { namespace: 'test', pricePrecision: 6, tickChunkIntervalMs: DAY, candleChunkIntervalMs: 7 * DAY, conflictPolicy: 'ignore' },
      scheduler: { tickMs: 1_000, lifecycleIntervalMs: HOUR },
    });
    app = buildApp(engine, { apiKey: KEY });
  });

  describe('health', () => {
    it('answers liveness', async () => {
      const res = await request(app).get(`${P}/health/liveness`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true });
    });

    it('reports unconfigured backends as disabled', async () => {
      const res = await request(app).get(`${P}/health/readiness`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'ready', checks: { engine: 'ok', db: 'disabled', redis: 'disabled' } });
    });

    it('is not ready when a configured backend fails its probe', async () => {
      const probed = buildApp(engine, { apiKey: KEY, probes: { redis: async () => false } });
      const res = await request(probed).get(`${P}/health/readiness`);
      expect(res.status).toBe(503);
      expect(res.body.checks.redis).toBe('fail');
    });
  });

  describe('ingest', () => {
    it('requires the api key', async () => {
      const res = await request(app).post(`${P}/ingest`).send({ items: [candle(T0, 1.15)] });
      expect(res.status).toBe(401);
      expect(res.body.error.code).toBe('AUTH_REQUIRED');
    });

    it('accepts a batch and reports per-item outcomes', async () => {
      const res = await request(app)
        .post(`${P}/ingest`)
        .set('x-api-key', KEY)
        .send({ items: [candle(T0, 1.15), candle(T0 + MIN, 1.18), { kind: 'trade' }] });

      expect(res.status).toBe(202);
      expect(res.body).toMatchObject({ accepted: 2, duplicates: 0, rejected: 0, skipped: 1 });
      expect(res.body.errors[0]).toMatchObject({ index: 2, code: 'VALIDATION_ERROR' });
    });

    it('rejects an empty batch', async () => {
      const res = await request(app).post(`${P}/ingest`).set('x-api-key', KEY).send({ items: [] });
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects malformed JSON', async () => {
      const res = await request(app)
        .post(`${P}/ingest`)
        .set('x-api-key', KEY)
        .set('Content-Type', 'application/json')
        .send('{"items": [');
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('INVALID_JSON');
    });
  });

  describe('candles', () => {
    beforeEach(() => {
      engine.ingest([candle(T0, 1.15), candle(T0 + MIN, 1.18)]);
    });

    it('reads a range in time order', async () => {
      const res = await request(app).get(`${P}/candles/EURUSD/1m`).query({ start: T0 });
      expect(res.status).toBe(200);
      expect(res.body.symbol).toBe('EURUSD');
      expect(res.body.items.map((c: { close: number }) => c.close)).toEqual([1.15, 1.18]);
    });

    it('accepts ISO timestamps', async () => {
      const res = await request(app)
        .get(`${P}/candles/EURUSD/1m`)
        .query({ start: '2024-01-02T10:01:00Z', end: '2024-01-02T10:02:00Z' });
      expect(res.body.items.map((c: { time: number }) => c.time)).toEqual([T0 + MIN]);
    });

    it('returns the latest candles newest first', async () => {
      const res = await request(app).get(`${P}/candles/EURUSD/1m/latest`).query({ limit: 1 });
      expect(res.status).toBe(200);
      expect(res.body.items.map((c: { time: number }) => c.time)).toEqual([T0 + MIN]);
    });

    it('computes indicators', async () => {
      const res = await request(app).get(`${P}/indicators/EURUSD/1m/atr`).query({ period: 2, start: T0 });
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ indicator: 'atr', points: [{ time: T0 }, { time: T0 + MIN }] });
    });

    it('maps bad input to 400', async () => {
      const badTf = await request(app).get(`${P}/candles/EURUSD/2m`).query({ start: T0 });
      expect(badTf.status).toBe(400);
      expect(badTf.body.error.code).toBe('VALIDATION_ERROR');

      const badLimit = await request(app).get(`${P}/candles/EURUSD/1m/latest`).query({ limit: 0 });
      expect(badLimit.status).toBe(400);
      expect(badLimit.body.error.code).toBe('INVALID_ARGUMENT');

      const inverted = await request(app).get(`${P}/candles/EURUSD/1m`).query({ start: T0 + MIN, end: T0 });
      expect(inverted.status).toBe(400);
      expect(inverted.body.error.code).toBe('INVALID_ARGUMENT');
    });
  });

  describe('admin', () => {
    it('defines aggregates once', async () => {
      const created = await request(app).post(`${P}/admin/aggregates`).set('x-api-key', KEY).send(ONE_MINUTE);
      expect(created.status).toBe(201);
      expect(created.body).toEqual({
        name: 'ohlcv_1m',
        source: 'ticks',
        timeframe: '1m',
        table: 'ohlcv_1m',
        running: false,
        refreshIntervalMs: MIN,
        stalenessMs: MIN,
        lastRefreshAt: null,
        watermark: null,
      });

      const again = await request(app).post(`${P}/admin/aggregates`).set('x-api-key', KEY).send(ONE_MINUTE);
      expect(again.status).toBe(400);
      expect(again.body.error).toEqual({ code: 'INVALID_ARGUMENT', message: 'aggregate ohlcv_1m already defined' });
    });

    it('runs a lifecycle pass at the given time and lists chunks', async () => {
      await request(app).post(`${P}/admin/aggregates`).set('x-api-key', KEY).send(ONE_MINUTE);
      engine.appendTick({ symbol: 'EURUSD', time: T0 + 10_000, bid: 1.1, ask: 1.1002 });

      const run = await request(app)
        .post(`${P}/admin/lifecycle/run`)
        .set('x-api-key', KEY)
        .send({ now: T0 + 10 * MIN });
      expect(run.status).toBe(200);
      expect(run.body.aborted).toBe(false);
      expect(run.body.refreshed).toMatchObject([{ aggregate: 'ohlcv_1m', buckets: 1, inserted: 1 }]);

      const chunks = await request(app).get(`${P}/admin/chunks`).set('x-api-key', KEY).query({ table: 'ohlcv_1m' });
      expect(chunks.body.items).toMatchObject([{ table: 'test.ohlcv_1m', state: 'OPEN', rowCount: 1 }]);
    });

    it('refuses a retention policy younger than compression', async () => {
      const compression = await request(app)
        .post(`${P}/admin/compression-policies`)
        .set('x-api-key', KEY)
        .send({ table: 'market_ticks', age_threshold: '7 days' });
      expect(compression.status).toBe(201);
      expect(compression.body.ageThresholdMs).toBe(7 * DAY);

      const retention = await request(app)
        .post(`${P}/admin/retention-policies`)
        .set('x-api-key', KEY)
        .send({ table: 'market_ticks', age_threshold: '1 day' });
      expect(retention.status).toBe(400);
      expect(retention.body.error.code).toBe('INVALID_ARGUMENT');
    });
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get(`${P}/nope`);
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });
});
