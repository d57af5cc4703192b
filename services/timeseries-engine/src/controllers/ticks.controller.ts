import type { Request, Response } from 'express';
import type { TimeseriesEngine } from '../engine.js';
import { IngestBody, RangeQuery } from '../utils/validators.js';

export function ticksController(engine: TimeseriesEngine) {
  return {
    async history(req: Request, res: Response) {
      const { start, end } = RangeQuery.parse(req.query);
      const symbol = req.params.symbol;
      res.json({ symbol, items: engine.readTicks(symbol, start, end) });
    },

    async ingest(req: Request, res: Response) {
      const { items } = IngestBody.parse(req.body);
      res.status(202).json(engine.ingest(items));
    },
  };
}
