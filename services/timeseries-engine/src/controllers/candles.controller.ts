import type { Request, Response } from 'express';
import type { TimeseriesEngine } from '../engine.js';
import { AtrQuery, AverageQuery, CandleParams, LatestQuery, RangeQuery } from '../utils/validators.js';

export function candlesController(engine: TimeseriesEngine) {
  return {
    async range(req: Request, res: Response) {
      const { symbol, timeframe } = CandleParams.parse(req.params);
      const { start, end } = RangeQuery.parse(req.query);
      const items = engine.readRange(symbol, timeframe, start, end);
      res.json({ symbol, timeframe, items });
    },

    async latest(req: Request, res: Response) {
      const { symbol, timeframe } = CandleParams.parse(req.params);
      const { limit } = LatestQuery.parse(req.query);
      res.json({ symbol, timeframe, items: engine.latest(symbol, timeframe, limit) });
    },

    async atr(req: Request, res: Response) {
      const { symbol, timeframe } = CandleParams.parse(req.params);
      const q = AtrQuery.parse(req.query);
      const points = engine.atr(symbol, timeframe, { period: q.period, startTime: q.start, endTime: q.end });
      res.json({ symbol, timeframe, indicator: 'atr', points });
    },

    async sma(req: Request, res: Response) {
      const { symbol, timeframe } = CandleParams.parse(req.params);
      const q = AverageQuery.parse(req.query);
      const points = engine.sma(symbol, timeframe, { period: q.period, startTime: q.start, endTime: q.end });
      res.json({ symbol, timeframe, indicator: 'sma', points });
    },

    async ema(req: Request, res: Response) {
      const { symbol, timeframe } = CandleParams.parse(req.params);
      const q = AverageQuery.parse(req.query);
      const points = engine.ema(symbol, timeframe, { period: q.period, startTime: q.start, endTime: q.end });
      res.json({ symbol, timeframe, indicator: 'ema', points });
    },
  };
}
